/**
 * Report rendering: sorting plus table / CSV output.
 * Each function returns lines; the caller decides where they go.
 */

import type { OutputFormat, SortMode, TicketResult } from '@jira-branch-checker/shared';
import { compareCodeUnits } from './ticket-extractor.js';

const HEADERS = { ticket: 'Ticket', status: 'Status', link: 'Link' } as const;
const COLUMN_GAP = '  ';

/**
 * Sort by lower-cased status text or by ticket id. Stable; returns a new array.
 */
export function sortResults(results: readonly TicketResult[], mode: SortMode): TicketResult[] {
  const key = mode === 'status'
    ? (result: TicketResult) => result.status.toLowerCase()
    : (result: TicketResult) => result.ticket;

  return [...results].sort((a, b) => compareCodeUnits(key(a), key(b)));
}

export interface ColumnWidths {
  ticket: number;
  status: number;
}

/** Width in code points, so astral characters such as emoji count once */
function displayLength(text: string): number {
  return [...text].length;
}

function pad(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - displayLength(text)));
}

export function columnWidths(results: readonly TicketResult[]): ColumnWidths {
  return {
    ticket: Math.max(HEADERS.ticket.length, ...results.map((r) => displayLength(r.ticket))),
    status: Math.max(HEADERS.status.length, ...results.map((r) => displayLength(r.status))),
  };
}

export function formatTable(results: readonly TicketResult[]): string[] {
  const widths = columnWidths(results);
  const row = (ticket: string, status: string, link: string) =>
    [pad(ticket, widths.ticket), pad(status, widths.status), link].join(COLUMN_GAP);

  return [
    row(HEADERS.ticket, HEADERS.status, HEADERS.link),
    row('-'.repeat(widths.ticket), '-'.repeat(widths.status), '-'.repeat(HEADERS.link.length)),
    ...results.map((r) => row(r.ticket, r.status, r.link)),
  ];
}

export function formatCsv(results: readonly TicketResult[]): string[] {
  return [
    `${HEADERS.ticket},${HEADERS.status},${HEADERS.link}`,
    ...results.map((r) => [r.ticket, r.status, r.link].map(escapeCsvField).join(',')),
  ];
}

/**
 * Quote a field only when it holds a comma, quote or line break (RFC 4180)
 */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function renderReport(results: readonly TicketResult[], format: OutputFormat): string[] {
  return format === 'csv' ? formatCsv(results) : formatTable(results);
}
