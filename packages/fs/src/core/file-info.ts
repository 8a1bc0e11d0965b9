import type { FileInfo } from "../ports/file-system"

/** Owner read/write, everyone else read-only. */
export const DEFAULT_FILE_MODE = 0o644

export type ObjectFileInfoInit = {
  name: string
  size: number
  modTime: Date
}

export class ObjectFileInfo implements FileInfo {
  readonly name: string
  readonly size: number
  readonly modTime: Date
  readonly mode = DEFAULT_FILE_MODE
  readonly sys = null

  constructor(init: ObjectFileInfoInit) {
    this.name = init.name
    this.size = init.size
    this.modTime = new Date(init.modTime.getTime())
    Object.freeze(this)
  }

  isDirectory(): boolean {
    return false
  }
}
