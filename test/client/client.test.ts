/**
 * Client facade tests
 *
 * Tests for the transaction client including:
 * - Stub construction from options and endpoint addresses
 * - Load-balanced transaction creation
 * - Login and session metadata
 * - Administrative calls and their failure mapping
 * - Scoped and retried transactions
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import {
  authorizationMetadata,
  createGraphClient,
  endpointUrl,
} from '../../src/client/index.js';
import {
  AbortedError,
  ConfigurationError,
  ConnectionError,
  RpcError,
} from '../../src/errors/index.js';
import { configureLogging, resetLogging } from '../../src/observability/index.js';
import { FakeStub } from '../helpers/fake-stub.js';

beforeEach(() => {
  configureLogging({ level: 'silent' });
});

afterEach(() => {
  resetLogging();
  vi.restoreAllMocks();
});

// ============================================================================
// Construction
// ============================================================================

describe('createGraphClient', () => {
  it('should require at least one stub or endpoint', () => {
    expect(() => createGraphClient([])).toThrow('At least one stub or endpoint is required');
    expect(() => createGraphClient({ endpoints: [] })).toThrow(ConfigurationError);
  });

  it('should build HTTP stubs for endpoint addresses after prebuilt stubs', () => {
    const local = new FakeStub('local');
    const client = createGraphClient({
      stubs: [local],
      endpoints: ['graph-1:8080', 'https://graph-2.example.com/rpc'],
      tls: true,
    });

    expect(client.stubs.map((stub) => stub.endpoint)).toEqual([
      'local',
      'https://graph-1:8080/rpc',
      'https://graph-2.example.com/rpc',
    ]);
    client.close();
  });

  it('should reject both an API key and a bearer token', () => {
    expect(() =>
      createGraphClient({ endpoints: ['graph:8080'], apiKey: 'test-key', bearerToken: 'test-token' })
    ).toThrow('apiKey and bearerToken cannot both be provided');
  });
});

describe('endpointUrl', () => {
  it('should add scheme and RPC path to host:port addresses', () => {
    expect(endpointUrl('localhost:8080')).toBe('http://localhost:8080/rpc');
    expect(endpointUrl('localhost:8080', true)).toBe('https://localhost:8080/rpc');
  });

  it('should keep full URLs', () => {
    expect(endpointUrl('ws://localhost:8080/api', true)).toBe('ws://localhost:8080/api');
  });
});

describe('authorizationMetadata', () => {
  it('should format API keys and bearer tokens', () => {
    expect(authorizationMetadata('test-key')).toEqual([['authorization', 'test-key']]);
    expect(authorizationMetadata(undefined, 'test-token')).toEqual([
      ['authorization', 'Bearer test-token'],
    ]);
    expect(authorizationMetadata()).toEqual([]);
  });
});

// ============================================================================
// Transactions
// ============================================================================

describe('client transactions', () => {
  it('should open transactions on a randomly chosen stub', async () => {
    const first = new FakeStub('a');
    const second = new FakeStub('b');
    const client = createGraphClient([first, second]);
    vi.spyOn(Math, 'random').mockReturnValue(0.75);

    await client.txn().query('{ q() }');

    expect(first.calls).toHaveLength(0);
    expect(second.callsOf('query')).toHaveLength(1);
    expect(client.anyStub()).toBe(second);
  });

  it('should pass transaction options through', () => {
    const client = createGraphClient([new FakeStub()]);
    const txn = client.txn({ readOnly: true, bestEffort: true });
    expect(txn.readOnly).toBe(true);
    expect(txn.bestEffort).toBe(true);
  });

  it('should discard a scoped transaction on every exit path', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);

    await expect(
      client.withTransaction(async (txn) => {
        await txn.mutate({ setObj: { name: 'A' } });
        throw new Error('changed my mind');
      })
    ).rejects.toThrow('changed my mind');
    expect(stub.callsOf('commitOrAbort')[0]?.context?.aborted).toBe(true);

    const committed = await client.withTransaction(async (txn) => {
      await txn.mutate({ setObj: { name: 'B' } });
      return txn.commit();
    });
    expect(committed?.commitTs).toBe(11);
    expect(stub.callsOf('commitOrAbort')).toHaveLength(2);
  });

  it('should apply the client retry policy, overridable per call', async () => {
    const client = createGraphClient({ stubs: [new FakeStub()], retry: { maxRetries: 0 } });
    const operation = vi.fn(async () => {
      throw new AbortedError();
    });

    await expect(client.runTransaction(operation)).rejects.toBeInstanceOf(AbortedError);
    expect(operation).toHaveBeenCalledTimes(1);

    await expect(
      client.runTransaction(operation, { maxRetries: 2, baseDelayMs: 0 })
    ).rejects.toBeInstanceOf(AbortedError);
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it('should keep the client policy for retry fields passed as undefined', async () => {
    const client = createGraphClient({ stubs: [new FakeStub()], retry: { maxRetries: 0 } });
    const done = vi.fn(async () => 'done');
    const conflicting = vi.fn(async () => {
      throw new AbortedError();
    });

    await expect(
      client.runTransaction(done, { readOnly: true, maxRetries: undefined })
    ).resolves.toBe('done');
    await expect(
      client.runTransaction(conflicting, { maxRetries: undefined })
    ).rejects.toBeInstanceOf(AbortedError);
    expect(conflicting).toHaveBeenCalledTimes(1);
  });
});

// ============================================================================
// Sessions
// ============================================================================

describe('client sessions', () => {
  it('should log in and attach the access token to later calls', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);

    await client.login('groot', 'password');
    await client.checkVersion();

    expect(stub.callsOf('login')[0]?.login).toEqual({ userId: 'groot', password: 'password' });
    expect(stub.callsOf('checkVersion')[0]?.options.metadata).toEqual([['accessjwt', 'access-1']]);
    expect(client.getSession()).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1' });
    expect(client.addLoginMetadata([['trace-id', 'abc']])).toEqual([
      ['accessjwt', 'access-1'],
      ['trace-id', 'abc'],
    ]);
  });

  it('should log into a namespace', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);

    await client.loginIntoNamespace('alice', 'secret', 3);

    expect(stub.callsOf('login')[0]?.login).toEqual({
      userId: 'alice',
      password: 'secret',
      namespace: 3,
    });
  });

  it('should refresh the session on demand', async () => {
    const stub = new FakeStub();
    let issued = 0;
    stub.onLogin = async () => {
      issued++;
      return { accessJwt: `access-${issued}`, refreshJwt: `refresh-${issued}` };
    };
    const client = createGraphClient([stub]);
    await client.login('groot', 'password');

    await expect(client.refreshSession()).resolves.toEqual({
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
    });
  });
});

// ============================================================================
// Administration
// ============================================================================

describe('client administration', () => {
  it('should apply schema operations', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);

    await expect(
      client.alter({ schema: 'name: string @index(exact) .' }, { timeoutMs: 25 })
    ).resolves.toEqual({ data: 'Success' });

    const call = stub.callsOf('alter')[0];
    expect(call?.operation).toEqual({ schema: 'name: string @index(exact) .' });
    expect(call?.options.timeoutMs).toBe(25);
  });

  it('should return the version tag', async () => {
    const client = createGraphClient([new FakeStub()]);
    await expect(client.checkVersion()).resolves.toBe('v1.2.3');
  });

  it('should map connection failures and keep conflicts as raw errors', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);

    stub.onCheckVersion = async () => {
      throw new RpcError('connection', 'checkVersion', 'connect ECONNREFUSED');
    };
    await expect(client.checkVersion()).rejects.toBeInstanceOf(ConnectionError);

    const conflict = new RpcError('aborted', 'alter', 'conflict with concurrent alter');
    stub.onAlter = async () => {
      throw conflict;
    };
    await expect(client.alter({ dropAll: true })).rejects.toBe(conflict);
  });

  it('should refresh an expired session and resend admin calls', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);
    await client.login('groot', 'password');
    let expired = true;
    stub.onAlter = async () => {
      if (expired) {
        expired = false;
        throw new RpcError('session-expired', 'alter', 'Token is expired');
      }
      return { data: 'Success' };
    };

    await expect(client.alter({ dropOp: 'DATA' })).resolves.toEqual({ data: 'Success' });
    expect(stub.callsOf('alter')).toHaveLength(2);
    expect(stub.callsOf('login')[1]?.login).toEqual({ refreshToken: 'refresh-1' });
  });

  it('should not map failures of a cancelled admin call', async () => {
    const stub = new FakeStub();
    const client = createGraphClient([stub]);
    const controller = new AbortController();
    const failure = new RpcError('connection', 'checkVersion', 'socket hang up');
    stub.onCheckVersion = async () => {
      controller.abort(new Error('stop'));
      throw failure;
    };

    await expect(client.checkVersion({ signal: controller.signal })).rejects.toBe(failure);
  });

  it('should close every stub', () => {
    const stubs = [new FakeStub('a'), new FakeStub('b')];
    const client = createGraphClient(stubs);

    client.close();

    expect(stubs.every((stub) => stub.closed)).toBe(true);
  });
});
