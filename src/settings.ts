import chalk = require('chalk')
import { DiagnosticFormatters } from './shared/diagnostics'

export type Settings = {
  loggers: Loggers
  formatters?: DiagnosticFormatters
}

export type Loggers = {
  debug: (text: string) => void
  info: (text: string) => void
  warn: (text: string) => void
  error: (text: string) => void
}

export const defaultLoggers: Loggers = {
  debug: (text) => console.debug(chalk.gray(text)),
  info: (text) => console.info(chalk.cyanBright(text)),
  warn: (text) => console.warn(chalk.yellowBright(text)),
  error: (text) => console.error(chalk.redBright(text)),
}

export const silentLoggers: Loggers = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

export const colorFormatters: DiagnosticFormatters = {
  header: chalk.yellowBright,
  filePath: chalk.cyanBright,
  location: chalk.magentaBright,
  gutter: chalk.cyanBright,
  locationPointer: chalk.redBright,
  message: chalk.redBright,
}

export function defaultSettings(): Settings {
  return { loggers: defaultLoggers, formatters: colorFormatters }
}
