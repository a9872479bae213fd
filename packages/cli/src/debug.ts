import type { ConfigInput, ResolvedConfig } from '@ratiofit/core';

/**
 * Print the merged config sources and the effective configuration to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printConfigDebug(
  sources: readonly ConfigInput[],
  resolved: ResolvedConfig
): void {
  process.stderr.write(
    `[ratiofit] config sources: ${JSON.stringify(sources)}\n`
  );
  process.stderr.write(
    `[ratiofit] effective config: ${JSON.stringify(resolved.config, null, 2)}\n`
  );
  if (resolved.warnings.length === 0) {
    process.stderr.write('[ratiofit] config warnings: []\n');
    return;
  }
  process.stderr.write(
    `[ratiofit] config warnings: ${JSON.stringify(
      resolved.warnings.map((w) => ({ kind: w.kind, field: w.field }))
    )}\n`
  );
}

export function printConfigWarnings(resolved: ResolvedConfig): void {
  for (const warning of resolved.warnings) {
    process.stderr.write(`[ratiofit] warning: ${warning.message}\n`);
  }
}
