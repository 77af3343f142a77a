import {appendFile, mkdir, readFile, readdir, rm, stat, writeFile} from 'node:fs/promises'
import {access, constants} from 'node:fs'
import {dirname, resolve, sep} from 'node:path'
import type {FileEntry, FileReadOptions, FileReadResult, FileSystemProvider} from './types.js'

function assertInsideWorkspace(workspace: string, inputPath: string): string {
  const workspaceRoot = resolve(workspace)
  const fullPath = resolve(workspaceRoot, inputPath)
  const inWorkspace = fullPath === workspaceRoot || fullPath.startsWith(`${workspaceRoot}${sep}`)
  if (!inWorkspace) {
    throw new Error(`Path '${inputPath}' is outside workspace.`)
  }

  return fullPath
}

function fsReason(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return `${error.code} ${error.message}`
  }
  return error instanceof Error ? error.message : String(error)
}

/** File access confined to one workspace root. */
export class WorkspaceFileSystem implements FileSystemProvider {
  constructor(private readonly workspace: string) {}

  resolvePath(path: string): string {
    return assertInsideWorkspace(this.workspace, path)
  }

  async exists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path)
    return new Promise((resolvePromise) => {
      access(fullPath, constants.F_OK, (error) => {
        resolvePromise(!error)
      })
    })
  }

  async create(path: string, content: string): Promise<{path: string; size: number}> {
    const fullPath = this.resolvePath(path)
    await mkdir(dirname(fullPath), {recursive: true})
    await writeFile(fullPath, content, 'utf8')
    return {path, size: Buffer.byteLength(content)}
  }

  async read(path: string, options: FileReadOptions = {}): Promise<FileReadResult> {
    const content = await readFile(this.resolvePath(path), 'utf8')
    const lines = content.split('\n')
    const totalLines = lines.length
    if (options.startLine === undefined && options.endLine === undefined) {
      return {content, totalLines}
    }

    const startLine = Math.max(1, options.startLine ?? 1)
    const endLine = Math.min(totalLines, options.endLine ?? totalLines)
    return {
      content: lines.slice(startLine - 1, endLine).join('\n'),
      totalLines,
      startLine,
      endLine
    }
  }

  async update(path: string, content: string): Promise<{path: string; size: number}> {
    const fullPath = this.resolvePath(path)
    if (!(await this.exists(path))) {
      throw new Error(`File not found: ${path}`)
    }
    await writeFile(fullPath, content, 'utf8')
    return {path, size: Buffer.byteLength(content)}
  }

  async append(path: string, content: string): Promise<{path: string; created: boolean}> {
    const fullPath = this.resolvePath(path)
    const existed = await this.exists(path)
    if (!existed) await mkdir(dirname(fullPath), {recursive: true})
    await appendFile(fullPath, content, 'utf8')
    return {path, created: !existed}
  }

  async delete(path: string): Promise<void> {
    const fullPath = this.resolvePath(path)
    const info = await stat(fullPath)
    if (info.isDirectory()) {
      throw new Error(`'${path}' is a directory.`)
    }
    await rm(fullPath)
  }

  async list(path = '.'): Promise<FileEntry[]> {
    const fullPath = this.resolvePath(path)
    let names: string[]
    try {
      names = await readdir(fullPath)
    } catch (error) {
      throw new Error(`Failed to list directory: ${fsReason(error)}`)
    }

    const entries: FileEntry[] = []
    for (const name of names) {
      const info = await stat(resolve(fullPath, name))
      entries.push({
        name,
        type: info.isDirectory() ? 'directory' : 'file',
        size: info.size,
        modified: info.mtime.toISOString()
      })
    }

    return entries.sort((a, b) => (a.type === b.type ? a.name.localeCompare(b.name) : a.type.localeCompare(b.type)))
  }
}
