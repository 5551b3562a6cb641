import * as fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { SkippedRow, TaskSpec } from '../../types.js';

/**
 * Input column for each TaskSpec field.
 */
export const COLUMNS = {
  taskId: 'task_id',
  gitSnapshotRef: '.git.zip',
  issueText: 'updated_issue_description',
  buildDescriptorRef: 'dockerfile',
  testCommand: 'test_command',
} as const;

type Field = keyof typeof COLUMNS;

const FIELDS: readonly Field[] = ['taskId', 'gitSnapshotRef', 'issueText', 'buildDescriptorRef', 'testCommand'];

export interface ParsedRows {
  tasks: TaskSpec[];
  skipped: SkippedRow[];
  missingColumns: string[];
}

export interface RowSource {
  csv?: string;
  sheet?: string;
}

/**
 * Convert a Google Sheets URL to its CSV export URL. Anything else is returned unchanged.
 */
export function toCsvExportUrl(sheetUrl: string): string {
  if (sheetUrl.includes('export?format=csv')) {
    return sheetUrl;
  }
  const id = sheetUrl.match(/\/spreadsheets\/d\/([A-Za-z0-9_-]+)/)?.[1];
  if (!id) {
    return sheetUrl;
  }
  const gid = sheetUrl.match(/[#&?]gid=([0-9]+)/)?.[1];
  return `https://docs.google.com/spreadsheets/d/${id}/export?format=csv${gid ? `&gid=${gid}` : ''}`;
}

export async function readRowsText(source: RowSource, fetchImpl: typeof fetch = fetch): Promise<string> {
  if (source.sheet) {
    const url = toCsvExportUrl(source.sheet);
    const response = await fetchImpl(url, { redirect: 'follow' });
    if (!response.ok) {
      throw new Error(`Failed to read sheet (HTTP ${response.status}): ${url}`);
    }
    return response.text();
  }
  if (source.csv) {
    return fs.readFile(source.csv, 'utf-8');
  }
  throw new Error('Provide --sheet or --csv');
}

function isStringTable(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

/**
 * Turn CSV text into eligible tasks plus the rows that never enter the pipeline.
 *
 * A row is skipped when task_id is empty, when the id repeats an earlier row,
 * or when any other required field is empty.
 */
export function parseTaskRows(text: string): ParsedRows {
  const table: unknown = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  if (!isStringTable(table) || table.length === 0) {
    return { tasks: [], skipped: [], missingColumns: FIELDS.map(f => COLUMNS[f]) };
  }

  const header = table[0].map(cell => cell.trim());
  const missingColumns = FIELDS.map(f => COLUMNS[f]).filter(column => !header.includes(column));
  if (missingColumns.length > 0) {
    return { tasks: [], skipped: [], missingColumns };
  }

  const tasks: TaskSpec[] = [];
  const skipped: SkippedRow[] = [];
  const seen = new Set<string>();

  table.slice(1).forEach((cells, index) => {
    const row = index + 1;
    const value = (field: Field) => (cells[header.indexOf(COLUMNS[field])] ?? '').trim();

    const taskId = value('taskId');
    if (!taskId) {
      skipped.push({ row, reason: 'missing task_id' });
      return;
    }
    if (seen.has(taskId)) {
      skipped.push({ row, taskId, reason: 'duplicate task_id' });
      return;
    }
    seen.add(taskId);

    const empty = FIELDS.filter(field => !value(field)).map(field => COLUMNS[field]);
    if (empty.length > 0) {
      skipped.push({ row, taskId, reason: `missing fields: ${empty.join(', ')}` });
      return;
    }

    tasks.push(Object.freeze({
      taskId,
      gitSnapshotRef: value('gitSnapshotRef'),
      issueText: value('issueText'),
      buildDescriptorRef: value('buildDescriptorRef'),
      testCommand: value('testCommand'),
    }));
  });

  return { tasks, skipped, missingColumns: [] };
}
