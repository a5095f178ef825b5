/**
 * Sheet source backed by the `gog` CLI.
 *
 * `gog sheets get <id> <range> --json` prints `{ "values": [[...], ...] }`.
 * The process gets a fixed timeout and is never retried here; the cache gate
 * decides what a failure means for the caller.
 */

import { spawn } from 'child_process';
import type { Logger } from 'pino';
import { createChildLogger } from '@/utils/logger';
import { formatValidationErrors, getSheetResponseValidator } from '@/validation/ajv_instance';
import type { SheetValues } from '@/types/scan';

const DEFAULT_TIMEOUT_MS = 30_000;

export interface SheetSource {
  fetchValues(): Promise<SheetValues>;
}

export type SheetSourceFailure = 'config' | 'process' | 'timeout' | 'output';

export class SheetSourceError extends Error {
  constructor(
    message: string,
    public readonly reason: SheetSourceFailure,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SheetSourceError';
  }
}

export interface GogSheetSourceOptions {
  sheetId: string;
  range: string;
  account: string;
  command?: string;
  timeoutMs?: number;
}

export function parseSheetOutput(stdout: string): SheetValues {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new SheetSourceError('Sheet output is not valid JSON', 'output', error);
  }

  const validate = getSheetResponseValidator();
  if (!validate(parsed)) {
    throw new SheetSourceError(
      `Sheet output has an unexpected shape: ${formatValidationErrors(validate).join('; ')}`,
      'output'
    );
  }

  return (parsed.values ?? []).map((row) => row.map((value) => String(value)));
}

export class GogSheetSource implements SheetSource {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: GogSheetSourceOptions) {
    this.command = options.command ?? 'gog';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = createChildLogger('sheet_source', { range: options.range });
  }

  fetchValues(): Promise<SheetValues> {
    const { sheetId, range, account } = this.options;
    if (!sheetId || !account) {
      return Promise.reject(
        new SheetSourceError('GOOGLE_SHEET_ID and GOG_ACCOUNT must be set', 'config')
      );
    }

    return new Promise((resolve, reject) => {
      const child = spawn(this.command, ['sheets', 'get', sheetId, range, '--json'], {
        env: { ...process.env, GOG_ACCOUNT: account },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      const timeout = setTimeout(() => {
        child.kill();
        reject(new SheetSourceError(`Sheet fetch timed out (${this.timeoutMs}ms)`, 'timeout'));
      }, this.timeoutMs);

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (err) => {
        clearTimeout(timeout);
        reject(new SheetSourceError(`Failed to spawn ${this.command}: ${err.message}`, 'process', err));
      });

      child.on('close', (code) => {
        clearTimeout(timeout);

        if (code !== 0) {
          reject(
            new SheetSourceError(
              `${this.command} exited with code ${code}: ${stderr.trim() || stdout.trim()}`,
              'process'
            )
          );
          return;
        }

        try {
          const values = parseSheetOutput(stdout);
          this.logger.debug({ rows: values.length }, 'Sheet fetched');
          resolve(values);
        } catch (error) {
          reject(error);
        }
      });
    });
  }
}
