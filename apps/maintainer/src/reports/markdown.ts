export const MAX_TABLE_ROWS = 50
export const MAX_NAME_LENGTH = 50

export function truncate(value: string, length: number): string {
  return value.length > length ? `${value.slice(0, length)}...` : value
}

/** Keep table cells on one row. */
export function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ')
}

export function table(headers: readonly string[], rows: readonly (readonly (string | number)[])[]): string[] {
  return [
    `| ${headers.join(' | ')} |`,
    `|${headers.map(header => '-'.repeat(header.length + 2)).join('|')}|`,
    ...rows.map(row => `| ${row.map(value => escapeCell(String(value))).join(' | ')} |`),
  ]
}

export function overflowNote(total: number, shown: number): string[] {
  return total > shown ? ['', `*... and ${total - shown} more*`] : []
}
