import { Settings } from '../settings'

export type CodeLoc = {
  line: number
  col: number
}

/** A failure located in a string input */
export type Diagnostic = {
  source: string
  input: string
  offset: number
  message: string
  complements?: [string, string][]
}

export type DiagnosticFormatters = {
  wrapper?: (error: string) => string
  header?: (header: string) => string
  filePath?: (filePath: string) => string
  location?: (col: string) => string
  gutter?: (text: string) => string
  locationPointer?: (char: string) => string
  failedLine?: (line: string) => string
  message?: (message: string) => string
  complementName?: (name: string) => string
  complement?: (fullText: string) => string
}

/** Zero-based line and column of an offset, lines being separated by `\n` */
export function locate(input: string, offset: number): CodeLoc {
  const before = input.substring(0, offset)
  const lineStart = before.lastIndexOf('\n') + 1

  let line = 0
  for (let i = before.indexOf('\n'); i !== -1; i = before.indexOf('\n', i + 1)) line++

  return { line, col: offset - lineStart }
}

export function describeOffset(offset: number): string {
  return `parse failed at offset ${offset}`
}

export function formatErr(diag: Diagnostic, f?: DiagnosticFormatters): string {
  const format = (formatterName: keyof DiagnosticFormatters, text: string) => {
    const formatter = f?.[formatterName]
    return formatter ? formatter(text) : text
  }

  const formatFaultyLine = (line: string) => line.replace(/\t/g, '    ')

  const addTabsPadding = (line: string, col: number) => {
    const count = line.substring(0, col).match(/\t/g)
    return count === null ? col : col + count.length * 3 /* 4 - 1 for the already counted col. */
  }

  const { line, col } = locate(diag.input, diag.offset)

  const header = format(
    'header',
    `--> At ${format('filePath', diag.source)}${format('location', `:${line + 1}:${col + 1}`)}:`
  )

  const linePad = ' '.repeat((line + 1).toString().length)
  const paddingGutter = format('gutter', linePad + ' | ')

  const failedLine = diag.input.split('\n')[line]
  const locPtr = format('locationPointer', ' '.repeat(addTabsPadding(failedLine, col)) + '^')

  const text = [
    `${format('gutter', linePad)}${header}`,
    `${paddingGutter}`,
    `${format('gutter', `${line + 1} | `)}${format('failedLine', formatFaultyLine(failedLine))}`,
    `${paddingGutter}${locPtr} ${format('message', diag.message)}`,
    ...(diag.complements ?? []).map(
      ([name, text]) => `${linePad}${format('complement', `-> ${format('complementName', name)} : ${text}`)}`
    ),
  ].join('\n')

  return f?.wrapper?.(text) ?? text
}

export function reportErr(diag: Diagnostic, settings: Settings): void {
  settings.loggers.error(formatErr(diag, settings.formatters))
}
