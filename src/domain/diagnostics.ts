/**
 * Failure diagnostics domain model.
 */

/** One labeled block of read-only cluster inspection output. */
export interface DiagnosticBlock {
  label: string;
  available: boolean;
  /** Command output, or `diagnostic unavailable: <reason>`. */
  content: string;
}

export const UNAVAILABLE_PREFIX = 'diagnostic unavailable: ';

export function unavailableBlock(label: string, reason: string): DiagnosticBlock {
  return { label, available: false, content: `${UNAVAILABLE_PREFIX}${reason}` };
}

/** Render blocks in order, each under a `==== label ====` banner. */
export function renderDiagnostics(blocks: readonly DiagnosticBlock[]): string {
  return blocks
    .map((block) => `==== ${block.label} ====\n${block.content.trimEnd()}`)
    .join('\n');
}
