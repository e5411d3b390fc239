export { type KubernetesClientConfig, KubernetesClientProvider } from './client-provider.js';
export {
  formatKubernetesError,
  getErrorReason,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
  isRetryableError,
  type KubernetesApiError,
  type StoreOperation,
  toStoreError,
} from './errors.js';
