export type TerminalEntryType = 'command' | 'output'

export type TerminalEntry = {
  type: TerminalEntryType
  content: string
  timestamp: string
}

export type TerminalWriteResult = {ok: true; message: string} | {ok: false; error: string}

/** Access to the shell session a chat is attached to. */
export interface TerminalProvider {
  /** Most recent `maxLines` entries, oldest first. */
  read(sessionId: string, maxLines: number): Promise<TerminalEntry[]>
  write(sessionId: string, text: string): Promise<TerminalWriteResult>
  /** Drops whatever the provider keeps for a session that has ended. */
  release?(sessionId: string): void
}

export type FileEntry = {
  name: string
  type: 'file' | 'directory'
  size: number
  modified: string
}

export type FileReadOptions = {
  startLine?: number
  endLine?: number
}

export type FileReadResult = {
  content: string
  totalLines: number
  startLine?: number
  endLine?: number
}

/** Workspace file access. Every method rejects with an Error on failure. */
export interface FileSystemProvider {
  create(path: string, content: string): Promise<{path: string; size: number}>
  read(path: string, options?: FileReadOptions): Promise<FileReadResult>
  update(path: string, content: string): Promise<{path: string; size: number}>
  append(path: string, content: string): Promise<{path: string; created: boolean}>
  delete(path: string): Promise<void>
  list(path: string): Promise<FileEntry[]>
  exists(path: string): Promise<boolean>
}

export type SearchResult = {
  rank: number
  title: string
  url: string
  snippet: string
}

export type WebSearchResult = {ok: true; results: SearchResult[]} | {ok: false; error: string}

export type WebFetchResult =
  | {ok: true; url: string; title?: string; content: string; truncated: boolean}
  | {ok: false; error: string; suggestion?: string}

export interface WebProvider {
  search(query: string, maxResults: number): Promise<WebSearchResult>
  fetch(url: string, maxLength: number): Promise<WebFetchResult>
}

/** Turns an HTML document into readable text. */
export interface ContentExtractor {
  extract(html: string, url: string): Promise<{title?: string; content: string}>
}
