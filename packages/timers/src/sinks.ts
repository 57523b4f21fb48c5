/**
 * Destinations for exported report lines.
 */

import fs from 'node:fs'
import path from 'node:path'

export interface ReportSink {
  write(lines: readonly string[]): void
}

/** Keeps every written line in memory. */
export class MemorySink implements ReportSink {
  readonly lines: string[] = []

  write(lines: readonly string[]): void {
    this.lines.push(...lines)
  }

  toString(): string {
    return this.lines.map(l => l + '\n').join('')
  }
}

export type FileMode = 'write' | 'append'

/** Writes lines to a file, one per line, replacing or appending. */
export class FileSink implements ReportSink {
  constructor(
    readonly filePath: string,
    readonly mode: FileMode = 'write',
  ) {}

  write(lines: readonly string[]): void {
    const data = lines.map(l => l + '\n').join('')
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
    if (this.mode === 'append') {
      fs.appendFileSync(this.filePath, data)
    } else {
      fs.writeFileSync(this.filePath, data)
    }
  }
}

/** `<name>.txt`, or `name` itself when it already has an extension. */
export function defaultFileName(name: string): string {
  return name.includes('.') ? name : `${name}.txt`
}
