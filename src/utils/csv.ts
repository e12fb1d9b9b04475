/**
 * Minimal RFC 4180 reader/writer: quoted fields, doubled quotes, CRLF or LF,
 * optional UTF-8 BOM.
 */
export const parseCsv = (text: string): string[][] => {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let quoted = false

  for (let i = 0; i < input.length; i++) {
    const char = input[i]
    if (quoted) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        field += char
      }
      continue
    }

    if (char === '"') {
      quoted = true
    } else if (char === ',') {
      row.push(field)
      field = ''
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input[i + 1] === '\n') i++
      row.push(field)
      rows.push(row)
      row = []
      field = ''
    } else {
      field += char
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field)
    rows.push(row)
  }

  // blank lines carry no record
  return rows.filter((cells) => !(cells.length === 1 && cells[0].trim() === ''))
}

/** Header-keyed records; missing trailing cells read as ''. */
export const parseCsvRecords = (text: string): Record<string, string>[] => {
  const [header, ...rows] = parseCsv(text)
  if (!header) return []
  const columns = header.map((column) => column.trim())
  return rows.map((cells) => {
    const record: Record<string, string> = {}
    columns.forEach((column, index) => {
      record[column] = cells[index] ?? ''
    })
    return record
  })
}

export type CsvValue = string | number | boolean | Date | null | undefined

const formatCell = (value: CsvValue): string => {
  if (value === null || value === undefined) return ''
  const text = value instanceof Date ? value.toISOString() : String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export const toCsv = (columns: readonly string[], rows: Record<string, CsvValue>[]): string => {
  const lines = [columns.map((column) => formatCell(column)).join(',')]
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','))
  }
  return `${lines.join('\r\n')}\r\n`
}
