/**
 * Outputs surface
 * Appends `key=value` lines to the GitHub Actions output file when one is
 * configured, otherwise prints a JSON object on stdout.
 */

import { appendFile } from 'node:fs/promises';
import type { DeployOutputs } from '@keelson/shared';

export function formatOutputs(outputs: DeployOutputs): Record<string, string> {
  const record: Record<string, string> = {
    mode: outputs.mode,
    namespace: outputs.namespace,
    deployment: outputs.deployment,
    managed_by: outputs.managedBy,
    dry_run: String(outputs.dryRun),
  };
  if (outputs.changed !== undefined) {
    record.changed = String(outputs.changed);
  }
  if (outputs.commit !== undefined) {
    record.commit = outputs.commit;
  }
  return record;
}

export function toOutputLines(record: Record<string, string>): string {
  return Object.entries(record)
    .map(([key, value]) => `${key}=${value.replace(/[\r\n]+/g, ' ')}\n`)
    .join('');
}

export interface OutputSink {
  write(chunk: string): unknown;
}

export async function writeOutputs(
  outputs: DeployOutputs,
  outputFile: string | undefined,
  stdout: OutputSink = process.stdout
): Promise<void> {
  const record = formatOutputs(outputs);
  if (outputFile) {
    await appendFile(outputFile, toOutputLines(record), 'utf8');
    return;
  }
  stdout.write(`${JSON.stringify(record)}\n`);
}
