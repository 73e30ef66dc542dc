/**
 * Output Module
 * CLI 輸出 - JSON（預設）與 cli-table3 表格
 */

import Table from 'cli-table3';
import type { Command } from 'commander';
import { SdkError } from '../lib/errors.js';

export type OutputFormat = 'json' | 'table';

export function resolveFormat(cmd: Command): OutputFormat {
  const value: unknown = cmd.optsWithGlobals().format;
  return value === 'table' ? 'table' : 'json';
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function renderTable(head: string[], rows: string[][]): string {
  const table = new Table({
    head,
    style: { head: ['cyan'] },
    wordWrap: true,
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

/**
 * 鍵值兩欄表格
 */
export function renderKeyValueTable(entries: Record<string, unknown>): string {
  return renderTable(
    ['Key', 'Value'],
    Object.entries(entries).map(([key, value]) => [key, formatCell(value)])
  );
}

export function formatCell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * 錯誤代碼：SdkError 取 kind，其餘為 ERROR
 */
export function errorCode(error: unknown): string {
  if (error instanceof SdkError) {
    return error.kind.toUpperCase();
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'ERROR';
}

/**
 * 輸出錯誤並以 exit code 1 結束
 */
export function exitWithError(format: OutputFormat, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);

  if (format === 'json') {
    printJson({
      success: false,
      error: {
        code: errorCode(error),
        message,
      },
    });
  } else {
    console.error(`Error: ${message}`);
  }

  process.exit(1);
}
