import { DIAGNOSTIC_LABELS, DiagnosticsCollector } from '../../src/cluster/diagnostics';
import { renderDiagnostics } from '../../src/domain/diagnostics';
import { FakeClusterClient } from '../helpers/fakes';

describe('DiagnosticsCollector', () => {
  it('collects resources, description, logs and events in order', async () => {
    const client = new FakeClusterClient();
    const collector = new DiagnosticsCollector(client, { deploymentName: 'web', logTailLines: 50, eventLimit: 10 });

    const blocks = await collector.collect('app=web', 'default');

    expect(blocks).toEqual([
      { label: DIAGNOSTIC_LABELS.resources, available: true, content: 'resources matching app=web' },
      { label: DIAGNOSTIC_LABELS.description, available: true, content: 'Name: web\nKind: deployment' },
      { label: DIAGNOSTIC_LABELS.logs, available: true, content: 'logs for app=web (tail 50)' },
      { label: DIAGNOSTIC_LABELS.events, available: true, content: 'events in default (last 10)' },
    ]);
    expect(client.calls).toEqual(['listResources', 'describe', 'logs', 'listEvents']);
  });

  it('replaces a failing block with an unavailable marker and keeps going', async () => {
    const client = new FakeClusterClient();
    client.failures.logs = 'pods "web" not found';
    const collector = new DiagnosticsCollector(client, { deploymentName: 'web' });

    const blocks = await collector.collect('app=web', 'default');

    expect(blocks).toHaveLength(4);
    expect(blocks.filter((b) => !b.available)).toEqual([
      { label: 'pod logs', available: false, content: 'diagnostic unavailable: pods "web" not found' },
    ]);
    expect(blocks[3].content).toBe('events in default (last 20)');
  });

  it('renders blocks under labelled banners', () => {
    expect(renderDiagnostics([
      { label: 'pod logs', available: true, content: 'line 1\n' },
      { label: 'recent events', available: false, content: 'diagnostic unavailable: timeout' },
    ])).toBe('==== pod logs ====\nline 1\n==== recent events ====\ndiagnostic unavailable: timeout');
  });
});
