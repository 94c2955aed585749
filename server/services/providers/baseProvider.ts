import { performance } from 'perf_hooks';

export type ProviderStatus = 'online' | 'degraded';

export interface ProviderCallMetadata {
  provider: string;
  status: ProviderStatus;
  lastOperation?: string;
  lastSuccessAt?: Date;
  lastErrorAt?: Date;
  lastError?: string;
  lastLatencyMs?: number;
  totalRequests: number;
  consecutiveFailures: number;
}

export abstract class BaseProviderAdapter {
  protected readonly metadata: ProviderCallMetadata;

  constructor(provider: string) {
    this.metadata = {
      provider,
      status: 'online',
      totalRequests: 0,
      consecutiveFailures: 0,
    };
  }

  protected async run<T>(operation: string, handler: () => Promise<T>): Promise<T> {
    const start = performance.now();
    this.metadata.lastOperation = operation;
    this.metadata.totalRequests += 1;
    try {
      const result = await handler();
      this.metadata.lastLatencyMs = Math.round(performance.now() - start);
      this.metadata.lastSuccessAt = new Date();
      this.metadata.status = 'online';
      this.metadata.consecutiveFailures = 0;
      return result;
    } catch (error) {
      this.metadata.lastLatencyMs = Math.round(performance.now() - start);
      this.metadata.lastErrorAt = new Date();
      this.metadata.lastError = error instanceof Error ? error.message : String(error);
      this.metadata.consecutiveFailures += 1;
      this.metadata.status = 'degraded';
      throw error;
    }
  }

  getMetadata(): ProviderCallMetadata {
    return { ...this.metadata };
  }
}

/**
 * One-line summary of a provider's call history, used when startup fails.
 */
export function describeProviderStatus(metadata: ProviderCallMetadata): string {
  const requests = `${metadata.totalRequests} request${metadata.totalRequests === 1 ? '' : 's'}`;
  const failures = `${metadata.consecutiveFailures} consecutive failure${metadata.consecutiveFailures === 1 ? '' : 's'}`;
  const parts = [requests, failures];
  if (metadata.lastOperation) {
    parts.push(`last operation: ${metadata.lastOperation}`);
  }
  if (metadata.lastError) {
    parts.push(`last error: ${metadata.lastError}`);
  }
  return `${metadata.provider}: ${metadata.status} (${parts.join(', ')})`;
}
