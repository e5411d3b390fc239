import { AlreadyExistsError } from '../core/errors.js';
import { getComponentLogger } from '../core/logging/index.js';
import type { CredentialStore } from '../core/store/types.js';
import { formatObjectKey, type IssueRequest } from '../core/types/issue-request.js';

export type TokenLookup =
  | { state: 'not-found' }
  | { state: 'empty' }
  | { state: 'present'; token: string };

/**
 * Manages the per-record credential holder. The operator only ever creates
 * the holder, empty; filling in the token is left to a human.
 */
export class SecretProvisioner {
  private logger = getComponentLogger('secret-provisioner');

  constructor(private readonly credentials: CredentialStore) {}

  /**
   * Create the empty holder if it does not exist yet. Resolves to whether
   * this call created it.
   */
  async ensureHolder(record: IssueRequest): Promise<boolean> {
    if (await this.credentials.get(record)) {
      return false;
    }

    try {
      await this.credentials.createEmpty(record);
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        this.logger.debug('Credential holder created concurrently', {
          owner: formatObjectKey(record.metadata),
        });
        return false;
      }
      throw error;
    }
    return true;
  }

  async readToken(record: IssueRequest): Promise<TokenLookup> {
    const holder = await this.credentials.get(record);
    if (!holder) {
      return { state: 'not-found' };
    }
    return holder.token ? { state: 'present', token: holder.token } : { state: 'empty' };
  }
}
