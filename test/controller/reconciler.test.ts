import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { ReconcileLoop } from '../../src/controller/reconciler.js';
import {
  IssueIdentityError,
  MalformedRepoRefError,
  RecordNotFoundError,
  RemoteRejectedError,
  RemoteUnavailableError,
  StoreUnavailableError,
  UnauthorizedError,
  WriteConflictError,
} from '../../src/core/errors.js';
import {
  ISSUE_REQUEST_FINALIZER,
  type IssueRequestSpec,
  type IssueRequestStatus,
  type ObjectKey,
} from '../../src/core/types/issue-request.js';
import { FakeCluster } from '../utils/fake-cluster.js';
import { FakeIssueTracker } from '../utils/fake-issue-tracker.js';

const KEY: ObjectKey = { namespace: 'default', name: 'build-failure' };
const T1 = new Date('2024-05-01T12:00:00.000Z');
const T2 = new Date('2024-05-01T13:30:00.000Z');

const SPEC: IssueRequestSpec = {
  repo: 'https://github.com/acme/widgets',
  title: 'Build fails on main',
  description: '',
};

function setup(options: { firstIssueNumber?: number } = {}) {
  const log: string[] = [];
  const cluster = new FakeCluster(log);
  const tracker = new FakeIssueTracker({ firstIssueNumber: options.firstIssueNumber ?? 42, log });
  const clock = { now: T1 };
  const reconciler = new ReconcileLoop(
    { store: cluster, credentials: cluster.credentials, ticketingClientFactory: tracker.factory },
    { tokenPollIntervalMs: 60_000, conflictRetryDelayMs: 5_000, now: () => clock.now }
  );
  return { log, cluster, tracker, clock, reconciler };
}

type Setup = ReturnType<typeof setup>;

function seedWithToken(
  env: Setup,
  spec: IssueRequestSpec = SPEC,
  status?: IssueRequestStatus
): void {
  env.cluster.seed({ ...KEY, spec, ...(status && { status }) });
  env.cluster.credentials.setToken(KEY, 'test-token');
}

const writeCalls = (tracker: FakeIssueTracker) =>
  tracker.calls.filter((call) => call.method !== 'findIssue');

describe('ReconcileLoop', () => {
  describe('Scenario walkthrough', () => {
    it('provisions a holder, then creates the issue once a token is filled in', async () => {
      const env = setup();
      env.cluster.seed({ ...KEY, spec: SPEC });

      const first = await env.reconciler.reconcile(KEY);

      expect(first).toEqual({ type: 'requeue' });
      expect(env.tracker.calls).toEqual([]);
      expect(env.cluster.credentials.holder(KEY)).toEqual({
        key: { namespace: 'default', name: 'build-failure-token-secret' },
        token: '',
      });
      expect(env.cluster.snapshot(KEY)?.metadata.finalizers).toEqual([ISSUE_REQUEST_FINALIZER]);
      expect(env.cluster.snapshot(KEY)?.status).toEqual({ tokenRequired: true });

      const waiting = await env.reconciler.reconcile(KEY);
      expect(waiting).toEqual({ type: 'requeueAfter', delayMs: 60_000 });
      expect(env.tracker.calls).toEqual([]);

      env.cluster.credentials.setToken(KEY, 'test-token');
      const second = await env.reconciler.reconcile(KEY);

      expect(second).toEqual({ type: 'done' });
      expect(env.tracker.calls.map((call) => call.method)).toEqual(['findIssue', 'createIssue']);
      expect(env.tracker.tokens).toEqual(['test-token']);
      expect(env.cluster.snapshot(KEY)?.status).toEqual({
        conditions: [
          {
            type: 'IssueOpen',
            status: 'True',
            reason: 'IssueIsOpen',
            message: 'Issue #42 is currently open',
            lastTransitionTime: '2024-05-01T12:00:00Z',
          },
          {
            type: 'HasPR',
            status: 'False',
            reason: 'NoPullRequest',
            message: 'Issue #42 does not have an associated pull request',
            lastTransitionTime: '2024-05-01T12:00:00Z',
          },
        ],
        issueNumber: 42,
        lastUpdated: '2024-05-01T12:00:00Z',
        tokenRequired: false,
      });
    });

    it('pushes a description edit to the tracked issue', async () => {
      const env = setup();
      seedWithToken(env);
      await env.reconciler.reconcile(KEY);

      env.cluster.editSpec(KEY, { description: 'Fails since the toolchain bump' });
      env.clock.now = T2;
      const result = await env.reconciler.reconcile(KEY);

      expect(result).toEqual({ type: 'done' });
      expect(env.tracker.callsTo('updateIssue')).toEqual([
        { method: 'updateIssue', repository: 'acme/widgets', issueNumber: 42 },
      ]);
      expect(env.tracker.issues('acme', 'widgets')).toEqual([
        {
          number: 42,
          title: 'Build fails on main',
          body: 'Fails since the toolchain bump',
          state: 'open',
          hasLinkedChangeRequest: false,
        },
      ]);
      const status = env.cluster.snapshot(KEY)?.status;
      expect(status?.issueNumber).toBe(42);
      expect(status?.lastUpdated).toBe('2024-05-01T13:30:00Z');
      expect(status?.conditions?.[0]?.lastTransitionTime).toBe('2024-05-01T12:00:00Z');
    });

    it('closes the issue before the record is erased', async () => {
      const env = setup();
      seedWithToken(env);
      await env.reconciler.reconcile(KEY);

      await env.cluster.delete(KEY);
      const result = await env.reconciler.reconcile(KEY);

      expect(result).toEqual({ type: 'done' });
      expect(env.tracker.issues('acme', 'widgets')[0]?.state).toBe('closed');
      expect(env.cluster.snapshot(KEY)).toBeUndefined();
      expect(env.log).toEqual([
        'create acme/widgets#42',
        'close acme/widgets#42',
        'erase default/build-failure',
      ]);
    });

    it('stops on a malformed repository URL without calling the tracker', async () => {
      const env = setup();
      seedWithToken(env, { ...SPEC, repo: 'not-a-url' });

      const result = await env.reconciler.reconcile(KEY);

      expect(result.type).toBe('fatal');
      expect(result.type === 'fatal' && result.error).toBeInstanceOf(MalformedRepoRefError);
      expect(env.tracker.calls).toEqual([]);
      expect(env.cluster.snapshot(KEY)?.status).toBeUndefined();
    });
  });

  describe('Fetch', () => {
    it('is done when the record does not exist', async () => {
      const env = setup();
      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
    });

    it('backs off when the store cannot be read', async () => {
      const env = setup();
      const failure = new StoreUnavailableError('get', 'default/build-failure', 'connection refused');
      env.cluster.failNext('get', failure);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'error', error: failure });
    });
  });

  describe('EnsureGuard', () => {
    it('requeues immediately when the finalizer cannot be written', async () => {
      const env = setup();
      seedWithToken(env);
      env.cluster.failNext('update', new StoreUnavailableError('update', 'default/build-failure', 'timeout'));

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'requeue' });
      expect(env.tracker.calls).toEqual([]);
    });
  });

  describe('Sync', () => {
    it('adopts an existing issue with the same title instead of creating one', async () => {
      const env = setup();
      seedWithToken(env);
      env.tracker.seedIssue('acme', 'widgets', { number: 7, title: 'Build fails on main', body: 'old' });

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.tracker.callsTo('createIssue')).toEqual([]);
      expect(env.cluster.snapshot(KEY)?.status?.issueNumber).toBe(7);
    });

    it('reports a linked pull request and a closed issue', async () => {
      const env = setup();
      seedWithToken(env);
      env.tracker.seedIssue('acme', 'widgets', {
        number: 9,
        title: 'Build fails on main',
        state: 'closed',
        hasLinkedChangeRequest: true,
      });

      await env.reconciler.reconcile(KEY);

      expect(env.cluster.snapshot(KEY)?.status?.conditions).toEqual([
        {
          type: 'IssueOpen',
          status: 'False',
          reason: 'IssueIsClosed',
          message: 'Issue #9 is closed',
          lastTransitionTime: '2024-05-01T12:00:00Z',
        },
        {
          type: 'HasPR',
          status: 'True',
          reason: 'PullRequestExists',
          message: 'Issue #9 has an associated pull request',
          lastTransitionTime: '2024-05-01T12:00:00Z',
        },
      ]);
    });

    it('fails permanently when the tracked issue has disappeared', async () => {
      const env = setup();
      seedWithToken(env, SPEC, { issueNumber: 7 });

      const result = await env.reconciler.reconcile(KEY);

      expect(result.type).toBe('fatal');
      expect(result.type === 'fatal' && result.error).toBeInstanceOf(IssueIdentityError);
      expect(env.tracker.callsTo('createIssue')).toEqual([]);
    });

    it('fails permanently when only a different issue matches by title', async () => {
      const env = setup();
      seedWithToken(env, SPEC, { issueNumber: 7 });
      env.tracker.seedIssue('acme', 'widgets', { number: 8, title: 'Build fails on main' });

      const result = await env.reconciler.reconcile(KEY);

      expect(result.type === 'fatal' && result.error.message).toBe(
        'Issue #7 in acme/widgets resolved to #8'
      );
      expect(env.tracker.callsTo('updateIssue')).toEqual([]);
    });

    it('waits on the token poll interval when the token is rejected', async () => {
      const env = setup();
      seedWithToken(env);
      env.tracker.failNext('findIssue', new UnauthorizedError());

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'requeueAfter', delayMs: 60_000 });
    });

    it.each([
      ['rejected', new RemoteRejectedError('create issue', 403, 'Forbidden')],
      ['unavailable', new RemoteUnavailableError('create issue', 502)],
    ])('backs off when the tracker is %s', async (_label, failure) => {
      const env = setup();
      seedWithToken(env);
      env.tracker.failNext('createIssue', failure);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'error', error: failure });
    });

    it('builds a fresh client per pass so a rotated token is used', async () => {
      const env = setup();
      seedWithToken(env);
      await env.reconciler.reconcile(KEY);

      env.cluster.credentials.setToken(KEY, 'rotated-token');
      await env.reconciler.reconcile(KEY);

      expect(env.tracker.tokens).toEqual(['test-token', 'rotated-token']);
    });

    it('clears tokenRequired once a token is present', async () => {
      const env = setup();
      seedWithToken(env, SPEC, { tokenRequired: true });

      await env.reconciler.reconcile(KEY);

      expect(env.cluster.snapshot(KEY)?.status?.tokenRequired).toBe(false);
    });
  });

  describe('StatusWrite', () => {
    it('retries after the conflict delay and converges on the next pass', async () => {
      const env = setup();
      seedWithToken(env);
      env.cluster.failNext('updateStatus', new WriteConflictError('default/build-failure'));

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'requeueAfter', delayMs: 5_000 });
      expect(env.cluster.snapshot(KEY)?.status).toBeUndefined();

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.cluster.snapshot(KEY)?.status?.issueNumber).toBe(42);
      expect(env.tracker.callsTo('createIssue')).toHaveLength(1);
    });

    it('applies the conflict delay to tokenRequired writes', async () => {
      const env = setup();
      env.cluster.seed({ ...KEY, spec: SPEC });
      env.cluster.failNext('updateStatus', new WriteConflictError('default/build-failure'));

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'requeueAfter', delayMs: 5_000 });
    });

    it('is done when the record disappears before the status write', async () => {
      const env = setup();
      seedWithToken(env);
      env.cluster.failNext('updateStatus', new RecordNotFoundError('default/build-failure'));

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
    });
  });

  describe('Teardown', () => {
    it('is done without remote calls when the finalizer is absent', async () => {
      const env = setup();
      env.cluster.seed({ ...KEY, spec: SPEC, finalizers: ['example.com/other'] });
      env.cluster.credentials.setToken(KEY, 'test-token');
      await env.cluster.delete(KEY);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.tracker.calls).toEqual([]);
      expect(env.cluster.snapshot(KEY)?.metadata.finalizers).toEqual(['example.com/other']);
    });

    it('keeps the finalizer and retries when closing fails', async () => {
      const env = setup();
      seedWithToken(env);
      await env.reconciler.reconcile(KEY);
      await env.cluster.delete(KEY);
      const failure = new RemoteUnavailableError('close issue', 503);
      env.tracker.failNext('closeIssue', failure);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'error', error: failure });
      expect(env.cluster.snapshot(KEY)?.metadata.finalizers).toEqual([ISSUE_REQUEST_FINALIZER]);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.cluster.snapshot(KEY)).toBeUndefined();
    });

    it('waits for a token while a tracked issue is still open', async () => {
      const env = setup();
      env.cluster.seed({
        ...KEY,
        spec: SPEC,
        status: { issueNumber: 42 },
        finalizers: [ISSUE_REQUEST_FINALIZER],
      });
      await env.cluster.delete(KEY);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'requeueAfter', delayMs: 60_000 });
      expect(env.cluster.snapshot(KEY)?.metadata.finalizers).toEqual([ISSUE_REQUEST_FINALIZER]);
    });

    it('releases the finalizer without a token when no issue was ever created', async () => {
      const env = setup();
      env.cluster.seed({ ...KEY, spec: SPEC, finalizers: [ISSUE_REQUEST_FINALIZER] });
      await env.cluster.delete(KEY);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.cluster.snapshot(KEY)).toBeUndefined();
      expect(env.tracker.calls).toEqual([]);
    });

    it('releases the finalizer when the repository URL is malformed', async () => {
      const env = setup();
      env.cluster.seed({
        ...KEY,
        spec: { ...SPEC, repo: 'not-a-url' },
        status: { issueNumber: 42 },
        finalizers: [ISSUE_REQUEST_FINALIZER],
      });
      env.cluster.credentials.setToken(KEY, 'test-token');
      await env.cluster.delete(KEY);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.cluster.snapshot(KEY)).toBeUndefined();
      expect(env.tracker.calls).toEqual([]);
    });

    it('does not close an issue that is already closed', async () => {
      const env = setup();
      seedWithToken(env);
      await env.reconciler.reconcile(KEY);
      await env.tracker.closeIssue('acme', 'widgets', {
        number: 42,
        title: 'Build fails on main',
        body: '',
        state: 'open',
        hasLinkedChangeRequest: false,
      });
      await env.cluster.delete(KEY);

      expect(await env.reconciler.reconcile(KEY)).toEqual({ type: 'done' });
      expect(env.tracker.callsTo('closeIssue')).toHaveLength(1);
      expect(env.cluster.snapshot(KEY)).toBeUndefined();
    });
  });

  describe('properties', () => {
    const text = fc.string({ minLength: 1, maxLength: 40 });

    it('leaves the remote issue equal to the latest title and body', async () => {
      await fc.assert(
        fc.asyncProperty(text, text, text, text, async (title1, body1, title2, body2) => {
          const env = setup();
          seedWithToken(env, { ...SPEC, title: title1, description: body1 });
          await env.reconciler.reconcile(KEY);

          env.cluster.editSpec(KEY, { title: title2, description: body2 });
          await env.reconciler.reconcile(KEY);

          const issues = env.tracker.issues('acme', 'widgets');
          expect(issues).toHaveLength(1);
          expect(issues[0]?.title).toBe(title2);
          expect(issues[0]?.body).toBe(body2);
        }),
        { numRuns: 50 }
      );
    });

    it('creates at most one issue however often status writes conflict', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.integer({ min: 0, max: 4 }),
          fc.integer({ min: 1, max: 6 }),
          async (conflicts, passes) => {
            const env = setup();
            seedWithToken(env);
            for (let i = 0; i < conflicts; i++) {
              env.cluster.failNext('updateStatus', new WriteConflictError('default/build-failure'));
            }

            for (let i = 0; i < passes; i++) {
              await env.reconciler.reconcile(KEY);
            }

            expect(env.tracker.callsTo('createIssue')).toHaveLength(1);
            expect(env.tracker.issues('acme', 'widgets')).toHaveLength(1);
          }
        ),
        { numRuns: 50 }
      );
    });

    it('never erases a record while its issue is still open', async () => {
      await fc.assert(
        fc.asyncProperty(fc.integer({ min: 0, max: 3 }), async (closeFailures) => {
          const env = setup();
          seedWithToken(env);
          await env.reconciler.reconcile(KEY);
          await env.cluster.delete(KEY);
          for (let i = 0; i < closeFailures; i++) {
            env.tracker.failNext('closeIssue', new RemoteUnavailableError('close issue', 503));
          }

          for (let i = 0; i <= closeFailures; i++) {
            await env.reconciler.reconcile(KEY);
          }

          expect(env.log.slice(-2)).toEqual(['close acme/widgets#42', 'erase default/build-failure']);
        }),
        { numRuns: 20 }
      );
    });

    it('makes no write call to the tracker without a usable token', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.constantFrom('absent', 'empty'),
          fc.boolean(),
          fc.constantFrom(0, 42),
          async (tokenState, deleting, issueNumber) => {
            const env = setup();
            env.cluster.seed({
              ...KEY,
              spec: SPEC,
              status: { issueNumber },
              finalizers: [ISSUE_REQUEST_FINALIZER],
            });
            env.tracker.seedIssue('acme', 'widgets', { number: 42, title: 'Build fails on main' });
            if (tokenState === 'empty') {
              env.cluster.credentials.setToken(KEY, '');
            }
            if (deleting) {
              await env.cluster.delete(KEY);
            }

            await env.reconciler.reconcile(KEY);
            await env.reconciler.reconcile(KEY);

            expect(writeCalls(env.tracker)).toEqual([]);
            expect(env.tracker.issues('acme', 'widgets')[0]?.state).toBe('open');
          }
        ),
        { numRuns: 30 }
      );
    });
  });
});
