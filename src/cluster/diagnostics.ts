/**
 * Diagnostics Collector.
 *
 * Best-effort, read-only inspection of the cluster after a failure. Every
 * block is attempted independently; a failing command yields an
 * "unavailable" block in its place and never aborts collection.
 */

import { DiagnosticBlock, unavailableBlock } from '../domain/diagnostics';
import { Logger, logger as rootLogger } from '../logger';
import { ClusterClient } from './cluster-client';

export interface DiagnosticsOptions {
  deploymentName: string;
  logTailLines: number;
  eventLimit: number;
}

export const DIAGNOSTIC_LABELS = {
  resources: 'cluster resources',
  description: 'deployment description',
  logs: 'pod logs',
  events: 'recent events',
} as const;

export class DiagnosticsCollector {
  private options: DiagnosticsOptions;

  constructor(
    private client: ClusterClient,
    options: Pick<DiagnosticsOptions, 'deploymentName'> & Partial<DiagnosticsOptions>,
    private log: Logger = rootLogger.child({ module: 'diagnostics' }),
  ) {
    this.options = { logTailLines: 100, eventLimit: 20, ...options };
  }

  async collect(selector: string, namespace: string, signal?: AbortSignal): Promise<DiagnosticBlock[]> {
    const { deploymentName, logTailLines, eventLimit } = this.options;
    return [
      await this.block(DIAGNOSTIC_LABELS.resources, () => this.client.listResources(selector, namespace, signal)),
      await this.block(DIAGNOSTIC_LABELS.description, () => this.client.describe('deployment', deploymentName, namespace, signal)),
      await this.block(DIAGNOSTIC_LABELS.logs, () => this.client.logs(selector, namespace, logTailLines, signal)),
      await this.block(DIAGNOSTIC_LABELS.events, () => this.client.listEvents(namespace, eventLimit, signal)),
    ];
  }

  private async block(label: string, read: () => Promise<string>): Promise<DiagnosticBlock> {
    try {
      return { label, available: true, content: await read() };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.warn('Diagnostic unavailable', { label, reason });
      return unavailableBlock(label, reason);
    }
  }
}
