import { Client } from '@opensearch-project/opensearch';
import { readFileSync } from 'fs';
import { z } from 'zod';

export interface OpenSearchConfig {
  nodeUrls: string[];
  username?: string;
  password?: string;
  requestTimeoutMs: number;
  maxRetries: number;
  sslCertPath?: string;
}

export interface ClusterHealth {
  status: 'green' | 'yellow' | 'red';
  numberOfNodes: number;
  activeShards: number;
  unassignedShards: number;
  clusterName: string;
}

const clusterHealthBodySchema = z.object({
  status: z.enum(['green', 'yellow', 'red']),
  number_of_nodes: z.number(),
  active_shards: z.number(),
  unassigned_shards: z.number(),
  cluster_name: z.string(),
});

let client: Client | null = null;

/**
 * Initializes the singleton client. Subsequent calls return the
 * existing instance and ignore `config`.
 */
export function initOpenSearch(config: OpenSearchConfig): Client {
  if (!client) {
    const ssl = config.sslCertPath
      ? { ca: readFileSync(config.sslCertPath, 'utf-8') }
      : undefined;

    const auth =
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined;

    client = new Client({
      nodes: config.nodeUrls,
      auth,
      ssl,
      requestTimeout: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
    });
  }
  return client;
}

export function getOpenSearch(): Client {
  if (!client) {
    throw new Error('OpenSearch client not initialized. Call initOpenSearch() first.');
  }
  return client;
}

export async function healthCheck(): Promise<ClusterHealth> {
  const { body } = await getOpenSearch().cluster.health();
  const health = clusterHealthBodySchema.parse(body);
  return {
    status: health.status,
    numberOfNodes: health.number_of_nodes,
    activeShards: health.active_shards,
    unassignedShards: health.unassigned_shards,
    clusterName: health.cluster_name,
  };
}

export async function closeOpenSearch(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
  }
}

/** Replaces the client instance, e.g. with a mock in tests. */
export function setOpenSearch(customClient: Client): void {
  client = customClient;
}

export function resetOpenSearch(): void {
  client = null;
}
