import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Client } from '@opensearch-project/opensearch';

const { MockClient, mockReadFileSync } = vi.hoisted(() => ({
  MockClient: vi.fn(),
  mockReadFileSync: vi.fn().mockReturnValue('test-ca-content'),
}));

vi.mock('@opensearch-project/opensearch', () => ({
  Client: MockClient,
}));

vi.mock('fs', () => ({
  readFileSync: mockReadFileSync,
}));

import {
  initOpenSearch,
  getOpenSearch,
  healthCheck,
  closeOpenSearch,
  setOpenSearch,
  resetOpenSearch,
} from './client';

const baseConfig = {
  nodeUrls: ['http://localhost:9200'],
  requestTimeoutMs: 30000,
  maxRetries: 5,
};

describe('stacker opensearch client', () => {
  beforeEach(() => {
    resetOpenSearch();
    vi.clearAllMocks();
    MockClient.mockImplementation(() => ({
      cluster: { health: vi.fn() },
      close: vi.fn().mockResolvedValue(undefined),
    }));
  });

  it('getOpenSearch throws before initialization', () => {
    expect(() => getOpenSearch()).toThrow('OpenSearch client not initialized');
  });

  it('setOpenSearch installs a replacement client', () => {
    const replacement = { replacement: true } as unknown as Client;
    setOpenSearch(replacement);
    expect(getOpenSearch()).toBe(replacement);
  });

  it('initOpenSearch builds the client once', () => {
    const first = initOpenSearch(baseConfig);
    expect(initOpenSearch(baseConfig)).toBe(first);
    expect(MockClient).toHaveBeenCalledOnce();
  });

  it('passes nodes, auth, timeout and retries to the client', () => {
    initOpenSearch({
      nodeUrls: ['http://os-1:9200', 'http://os-2:9200'],
      username: 'stacker',
      password: 'test-secret',
      requestTimeoutMs: 15000,
      maxRetries: 2,
    });

    expect(MockClient).toHaveBeenCalledWith({
      nodes: ['http://os-1:9200', 'http://os-2:9200'],
      auth: { username: 'stacker', password: 'test-secret' },
      ssl: undefined,
      requestTimeout: 15000,
      maxRetries: 2,
    });
  });

  it('omits auth when only a username is given', () => {
    initOpenSearch({ ...baseConfig, username: 'stacker' });
    expect(MockClient).toHaveBeenCalledWith(expect.objectContaining({ auth: undefined }));
  });

  it('reads the CA file when sslCertPath is set', () => {
    initOpenSearch({ ...baseConfig, sslCertPath: '/etc/stacker/ca.pem' });

    expect(mockReadFileSync).toHaveBeenCalledWith('/etc/stacker/ca.pem', 'utf-8');
    expect(MockClient).toHaveBeenCalledWith(
      expect.objectContaining({ ssl: { ca: 'test-ca-content' } }),
    );
  });

  describe('healthCheck', () => {
    it('maps the cluster health body', async () => {
      MockClient.mockImplementation(() => ({
        cluster: {
          health: vi.fn().mockResolvedValue({
            body: {
              status: 'yellow',
              number_of_nodes: 1,
              active_shards: 4,
              unassigned_shards: 4,
              cluster_name: 'stacker-dev',
            },
          }),
        },
        close: vi.fn(),
      }));

      initOpenSearch(baseConfig);

      await expect(healthCheck()).resolves.toEqual({
        status: 'yellow',
        numberOfNodes: 1,
        activeShards: 4,
        unassignedShards: 4,
        clusterName: 'stacker-dev',
      });
    });

    it('rejects an unexpected status value', async () => {
      MockClient.mockImplementation(() => ({
        cluster: {
          health: vi.fn().mockResolvedValue({
            body: {
              status: 'purple',
              number_of_nodes: 1,
              active_shards: 0,
              unassigned_shards: 0,
              cluster_name: 'stacker-dev',
            },
          }),
        },
        close: vi.fn(),
      }));

      initOpenSearch(baseConfig);

      await expect(healthCheck()).rejects.toThrow();
    });
  });

  it('closeOpenSearch closes and forgets the client', async () => {
    const close = vi.fn().mockResolvedValue(undefined);
    MockClient.mockImplementation(() => ({ cluster: { health: vi.fn() }, close }));

    initOpenSearch(baseConfig);
    await closeOpenSearch();

    expect(close).toHaveBeenCalledOnce();
    expect(() => getOpenSearch()).toThrow('OpenSearch client not initialized');
    await expect(closeOpenSearch()).resolves.toBeUndefined();
  });
});
