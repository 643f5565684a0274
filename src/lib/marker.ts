/**
 * Stackseed - Completion Marker
 *
 * An empty file on the service's persistent volume. Its presence means the
 * one-time setup already ran; removing it forces the next run to set up again.
 */

import fs from 'node:fs'
import path from 'node:path'

export interface CompletionMarker {
  readonly path: string
  exists(): boolean
  write(): void
}

export class FileMarker implements CompletionMarker {
  constructor(readonly path: string) {}

  exists(): boolean {
    return fs.existsSync(this.path)
  }

  write(): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true })
    fs.writeFileSync(this.path, '')
  }
}
