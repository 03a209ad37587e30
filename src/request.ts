/**
 * Looseleaf Request Client
 * ========================
 *
 * A thin `fetch` wrapper that decodes a JSON response and maps it into a
 * model before handing back the result. Failures come back as a
 * discriminated result, never as a rejected promise.
 *
 * @example
 * const client = createClient(store)
 * const result = await client.post('https://api.example.com/login', {
 *   params: { email: 'a@b.com' },
 *   model: 'login'
 * })
 * if (result.ok) {
 *   store.models.login.get('userId').int
 * } else {
 *   result.error.kind // 'http' | 'network' | ...
 * }
 */

import type { ModelInstance, ModelStore } from './index'
import { isJsonObject, isJsonObjectArray, type JsonObject, type JsonValue } from './json'

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type RequestErrorKind = 'invalidUrl' | 'headers' | 'network' | 'http' | 'emptyResponse' | 'parsing'

export class RequestError extends Error {
  readonly kind: RequestErrorKind
  readonly statusCode?: number

  constructor(kind: RequestErrorKind, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(`[Looseleaf] ${message}`, { cause: options.cause })
    this.name = 'RequestError'
    this.kind = kind
    this.statusCode = options.statusCode
  }
}

export type RequestResult =
  | {
      readonly ok: true
      /** The model the body was mapped into, if one was given. */
      readonly model: ModelInstance | undefined
      /** The decoded body as received. */
      readonly data: JsonObject | JsonObject[]
      /** Object bodies as-is; array bodies wrapped as `{ items }`. */
      readonly raw: JsonObject
    }
  | { readonly ok: false; readonly error: RequestError }

export interface RequestOptions {
  params?: Record<string, JsonValue>
  headers?: Record<string, string>
  /** Model to map the body into, as an instance or a registry name. */
  model?: ModelInstance | string
}

export interface RequestDescriptor extends RequestOptions {
  method: HttpMethod
  url: string
}

export interface ClientOptions {
  fetch?: typeof fetch
}

export interface ModelClient {
  readonly store: ModelStore
  execute(request: RequestDescriptor): Promise<RequestResult>
  get(url: string, options?: RequestOptions): Promise<RequestResult>
  post(url: string, options?: RequestOptions): Promise<RequestResult>
  put(url: string, options?: RequestOptions): Promise<RequestResult>
  patch(url: string, options?: RequestOptions): Promise<RequestResult>
  delete(url: string, options?: RequestOptions): Promise<RequestResult>
}

// =============================================================================
// REQUEST BUILDING
// =============================================================================

function queryValue(value: JsonValue): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value)
}

/**
 * Header precedence, lowest first: JSON defaults, bearer token, the store's
 * common headers, call-site headers.
 */
export function buildHeaders(store: ModelStore, headers: Record<string, string> = {}): Headers {
  const result = new Headers({
    'Content-Type': 'application/json',
    Accept: 'application/json'
  })

  const token = store.configuration.authTokenProvider?.()
  if (token) {
    result.set('Authorization', `Bearer ${token}`)
  }
  for (const [name, value] of Object.entries(store.configuration.commonHeaders)) {
    result.set(name, value)
  }
  for (const [name, value] of Object.entries(headers)) {
    result.set(name, value)
  }
  return result
}

/**
 * Returns `undefined` when the URL does not parse.
 */
export function buildUrl(url: string, method: HttpMethod, params: Record<string, JsonValue> = {}): URL | undefined {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return undefined
  }
  if (method === 'GET') {
    for (const [name, value] of Object.entries(params)) {
      parsed.searchParams.set(name, queryValue(value))
    }
  }
  return parsed
}

// =============================================================================
// CLIENT
// =============================================================================

export function createClient(store: ModelStore, options: ClientOptions = {}): ModelClient {
  const fetchImpl = options.fetch ?? globalThis.fetch
  const { logger } = store

  const fail = (url: string, error: RequestError): RequestResult => {
    logger.error(`✗ ${url} [${error.kind}]`, error)
    return { ok: false, error }
  }

  const execute = async (request: RequestDescriptor): Promise<RequestResult> => {
    const { method, url, params = {}, headers } = request

    const target = buildUrl(url, method, params)
    if (!target) {
      return fail(url, new RequestError('invalidUrl', `Invalid URL: ${url}`))
    }

    // The token provider runs here, before anything is sent
    let requestHeaders: Headers
    try {
      requestHeaders = buildHeaders(store, headers)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return fail(url, new RequestError('headers', `Header error: ${reason}`, { cause: error }))
    }

    const hasBody = method !== 'GET' && Object.keys(params).length > 0
    logger.info(`→ ${method} ${url}`)

    let response: Response
    try {
      response = await fetchImpl(target, {
        method,
        headers: requestHeaders,
        body: hasBody ? JSON.stringify(params) : undefined,
        signal: AbortSignal.timeout(store.configuration.requestTimeout * 1000)
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return fail(url, new RequestError('network', `Network error: ${reason}`, { cause: error }))
    }

    if (!response.ok) {
      return fail(
        url,
        new RequestError('http', `HTTP error: ${response.status}`, { statusCode: response.status })
      )
    }

    let text: string
    try {
      text = await response.text()
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return fail(url, new RequestError('network', `Network error: ${reason}`, { cause: error }))
    }
    if (text.trim().length === 0) {
      return fail(url, new RequestError('emptyResponse', 'Empty response body.'))
    }

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return fail(url, new RequestError('parsing', `Parsing error: ${reason}`, { cause: error }))
    }

    const model = typeof request.model === 'string' ? store.model(request.model) : request.model

    if (isJsonObject(body)) {
      model?.map(body)
      logger.info(`✓ ${url} mapped ${Object.keys(body).length} key(s) into ${model?.name ?? 'no model'}`)
      return { ok: true, model, data: body, raw: body }
    }
    if (isJsonObjectArray(body)) {
      model?.map(body)
      logger.info(`✓ ${url} mapped array (${body.length} item(s)) into ${model?.name ?? 'no model'}`)
      return { ok: true, model, data: body, raw: { items: body } }
    }
    return fail(url, new RequestError('parsing', 'Parsing error: Unexpected JSON root type.'))
  }

  return {
    store,
    execute,
    get: (url, opts = {}) => execute({ ...opts, method: 'GET', url }),
    post: (url, opts = {}) => execute({ ...opts, method: 'POST', url }),
    put: (url, opts = {}) => execute({ ...opts, method: 'PUT', url }),
    patch: (url, opts = {}) => execute({ ...opts, method: 'PATCH', url }),
    delete: (url, opts = {}) => execute({ ...opts, method: 'DELETE', url })
  }
}
