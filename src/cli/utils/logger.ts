/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 *
 * 结构化日志走 utils/logger 写入 stderr；这里只负责面向终端用户的提示。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
}

// NO_COLOR 或非 TTY 输出时不着色
function useColor(): boolean {
  return process.env.NO_COLOR === undefined && Boolean(process.stdout.isTTY);
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  if (!useColor()) return `${symbol} ${message}`;
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function success(message: string): void {
  console.log(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
