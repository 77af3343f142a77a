import {z} from 'zod'
import {errorMessage, withTimeout} from '../core/errors.js'
import {HtmlTextExtractor} from './html-text.js'
import type {ContentExtractor, SearchResult, WebFetchResult, WebProvider, WebSearchResult} from './types.js'

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

const USER_AGENT = 'termpilot/0.1 (+terminal assistant)'

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string(),
        content: z.string().default('')
      })
    )
    .default([])
})

export type HttpWebProviderOptions = {
  /** SearXNG-compatible endpoint answering `?q=<query>&format=json`. */
  searchUrl?: string
  timeoutMs?: number
  extractor?: ContentExtractor
  fetch?: FetchLike
}

export function normalizeUrl(raw: string): string | undefined {
  const candidate = raw.trim().startsWith('http') ? raw.trim() : `https://${raw.trim()}`
  let parsed: URL
  try {
    parsed = new URL(candidate)
  } catch {
    return undefined
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return undefined
  if (parsed.hostname.length <= 2 || !parsed.hostname.includes('.')) return undefined
  return parsed.toString()
}

function truncate(content: string, maxLength: number): {content: string; truncated: boolean} {
  if (content.length <= maxLength) return {content, truncated: false}
  return {
    content: `${content.slice(0, maxLength)}\n\n... [Content truncated. Use max_content_length parameter for longer content]`,
    truncated: true
  }
}

/** Web access over HTTP. Search needs a configured endpoint. */
export class HttpWebProvider implements WebProvider {
  private readonly searchUrl?: string
  private readonly timeoutMs: number
  private readonly extractor: ContentExtractor
  private readonly fetchImpl: FetchLike

  constructor(options: HttpWebProviderOptions = {}) {
    this.searchUrl = options.searchUrl
    this.timeoutMs = options.timeoutMs ?? 15_000
    this.extractor = options.extractor ?? new HtmlTextExtractor()
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  private async get(url: string, accept: string): Promise<Response> {
    return withTimeout(
      this.fetchImpl(url, {headers: {'User-Agent': USER_AGENT, Accept: accept}}),
      this.timeoutMs,
      `GET ${url}`
    )
  }

  async search(query: string, maxResults: number): Promise<WebSearchResult> {
    if (!this.searchUrl) {
      return {ok: false, error: 'Web search is not configured (set web.searchUrl).'}
    }

    const url = new URL(this.searchUrl)
    url.searchParams.set('q', query)
    url.searchParams.set('format', 'json')

    let response: Response
    try {
      response = await this.get(url.toString(), 'application/json')
    } catch (error) {
      return {ok: false, error: `Network error: ${errorMessage(error)}. Check internet connection.`}
    }

    if (!response.ok) {
      return {ok: false, error: `Search failed with HTTP ${response.status}. Try again later.`}
    }

    let body: unknown
    try {
      body = await response.json()
    } catch {
      return {ok: false, error: 'Search endpoint returned invalid JSON.'}
    }

    const parsed = searchResponseSchema.safeParse(body)
    if (!parsed.success) {
      return {ok: false, error: 'Search endpoint returned an unexpected payload.'}
    }

    const results: SearchResult[] = parsed.data.results.slice(0, maxResults).map((item, index) => ({
      rank: index + 1,
      title: item.title,
      url: item.url,
      snippet: item.content
    }))

    if (results.length === 0) {
      return {ok: false, error: `No search results found for '${query}'. Try different keywords.`}
    }
    return {ok: true, results}
  }

  async fetch(rawUrl: string, maxLength: number): Promise<WebFetchResult> {
    const url = normalizeUrl(rawUrl)
    if (!url) {
      return {
        ok: false,
        error: 'Invalid URL format. Consider using search_web first to find the correct URL.',
        suggestion: "Try using search_web tool instead to find the website you're looking for."
      }
    }

    let response: Response
    try {
      response = await this.get(url, 'text/html,text/plain,application/json;q=0.9,*/*;q=0.8')
    } catch (error) {
      return {
        ok: false,
        error: `Network error: ${errorMessage(error)}`,
        suggestion: 'The website may be down or unreachable. Try search_web to find alternative sources.'
      }
    }

    if (response.status === 404) {
      return {
        ok: false,
        error: 'Page not found (404). The URL may not exist.',
        suggestion: "Try using search_web to find the correct URL for the content you're looking for."
      }
    }
    if (!response.ok) {
      return {
        ok: false,
        error: `HTTP ${response.status}: Failed to fetch page`,
        suggestion: 'The website may be down or the URL may be incorrect. Try search_web to find alternative sources.'
      }
    }

    const body = await response.text()
    const contentType = response.headers.get('content-type') ?? ''
    if (!contentType.includes('html')) {
      return {ok: true, url, ...truncate(body, maxLength)}
    }

    const extracted = await this.extractor.extract(body, url)
    return {
      ok: true,
      url,
      ...(extracted.title?.trim() ? {title: extracted.title.trim()} : {}),
      ...truncate(extracted.content, maxLength)
    }
  }
}
