import type { Request, Response } from 'express'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { MemoryTokenStore } from '../db/memory.js'
import { createOAuthContext, type OAuthContext } from '../oauth/context.js'
import { registerClient } from '../oauth/registry.js'
import { createAuthorizeHandler, validateAuthorizeParams } from './authorize.js'

vi.mock('../utils/logger.js', () => ({
  default: { error: vi.fn(), info: vi.fn(), debug: vi.fn(), warn: vi.fn() },
}))

const REDIRECT_URI = 'https://app.example.com/cb'

describe('createAuthorizeHandler', () => {
  let store: MemoryTokenStore
  let ctx: OAuthContext
  let handleAuthorize: ReturnType<typeof createAuthorizeHandler>
  let mockReq: Partial<Request>
  let mockRes: Partial<Response>
  let mockJson: ReturnType<typeof vi.fn>
  let mockStatus: ReturnType<typeof vi.fn>
  let mockRedirect: ReturnType<typeof vi.fn>
  let clientId: string

  const next = vi.fn()

  async function callHandler(): Promise<void> {
    await handleAuthorize(mockReq as Request, mockRes as Response, next)
  }

  function redirectedUrl(): URL {
    expect(mockRedirect).toHaveBeenCalledTimes(1)
    expect(mockRedirect.mock.calls[0][0]).toBe(302)
    return new URL(mockRedirect.mock.calls[0][1])
  }

  beforeEach(async () => {
    store = new MemoryTokenStore()
    ctx = createOAuthContext({ store, clock: () => 1_700_000_000_000 })
    handleAuthorize = createAuthorizeHandler(ctx)
    const client = await registerClient(ctx, { redirect_uris: [REDIRECT_URI], client_name: 'Test Client' })
    clientId = client.client_id

    mockJson = vi.fn()
    mockStatus = vi.fn(() => ({ json: mockJson }))
    mockRedirect = vi.fn()
    mockReq = { query: {} }
    mockRes = { json: mockJson, status: mockStatus, redirect: mockRedirect }
  })

  it('response_typeがcode以外は400 unsupported_response_type', async () => {
    mockReq.query = { response_type: 'token', client_id: clientId, redirect_uri: REDIRECT_URI }
    await callHandler()
    expect(mockStatus).toHaveBeenCalledWith(400)
    expect(mockJson).toHaveBeenCalledWith({
      error: 'unsupported_response_type',
      error_description: 'Only response_type=code is supported',
    })
    expect(store.size().codes).toBe(0)
  })

  it('client_id未指定は400 invalid_request', async () => {
    mockReq.query = { response_type: 'code', redirect_uri: REDIRECT_URI }
    await callHandler()
    expect(mockStatus).toHaveBeenCalledWith(400)
    expect(mockJson).toHaveBeenCalledWith({
      error: 'invalid_request',
      error_description: 'Missing required parameters: client_id, redirect_uri',
    })
  })

  it('未登録のクライアントは400 invalid_request', async () => {
    mockReq.query = { response_type: 'code', client_id: 'unknown', redirect_uri: REDIRECT_URI }
    await callHandler()
    expect(mockStatus).toHaveBeenCalledWith(400)
    expect(mockJson).toHaveBeenCalledWith({ error: 'invalid_request', error_description: 'Unknown client_id' })
  })

  it('登録されていないredirect_uriは400 invalid_request', async () => {
    mockReq.query = { response_type: 'code', client_id: clientId, redirect_uri: 'https://evil.example.com/cb' }
    await callHandler()
    expect(mockStatus).toHaveBeenCalledWith(400)
    expect(mockJson).toHaveBeenCalledWith({
      error: 'invalid_request',
      error_description: 'redirect_uri is not registered for this client',
    })
    expect(mockRedirect).not.toHaveBeenCalled()
  })

  it('登録済みのクライアントとredirect_uriならコード付きでリダイレクトする', async () => {
    mockReq.query = { response_type: 'code', client_id: clientId, redirect_uri: REDIRECT_URI, state: 'state-1' }
    await callHandler()

    const url = redirectedUrl()
    expect(`${url.origin}${url.pathname}`).toBe(REDIRECT_URI)
    expect(url.searchParams.get('state')).toBe('state-1')
    const code = url.searchParams.get('code') ?? ''
    expect(code).toMatch(/^[A-Za-z0-9_-]{43}$/)

    expect(await store.findAuthorizationCode(code)).toEqual({
      code,
      client_id: clientId,
      redirect_uri: REDIRECT_URI,
      scope: 'mcp:tools mcp:resources',
      code_challenge: null,
      code_challenge_method: null,
      created_at: 1_700_000_000,
      expires_at: 1_700_000_600,
    })
  })

  it('stateがなければリダイレクト先にも付けない', async () => {
    mockReq.query = { response_type: 'code', client_id: clientId, redirect_uri: REDIRECT_URI, scope: 'mcp:tools' }
    await callHandler()
    const url = redirectedUrl()
    expect([...url.searchParams.keys()]).toEqual(['code'])
    expect((await store.findAuthorizationCode(url.searchParams.get('code') ?? ''))?.scope).toBe('mcp:tools')
  })

  it('方式未指定のチャレンジはplainとして保存する', async () => {
    mockReq.query = { response_type: 'code', client_id: clientId, redirect_uri: REDIRECT_URI, code_challenge: 'abc' }
    await callHandler()
    const record = await store.findAuthorizationCode(redirectedUrl().searchParams.get('code') ?? '')
    expect(record?.code_challenge).toBe('abc')
    expect(record?.code_challenge_method).toBe('plain')
  })

  it('ストアの例外は500 server_error', async () => {
    vi.spyOn(store, 'findClient').mockRejectedValue(new Error('store down'))
    mockReq.query = { response_type: 'code', client_id: clientId, redirect_uri: REDIRECT_URI }
    await callHandler()
    expect(mockStatus).toHaveBeenCalledWith(500)
    expect(mockJson).toHaveBeenCalledWith({ error: 'server_error', error_description: 'Internal server error' })
  })
})

describe('validateAuthorizeParams', () => {
  it('絶対URLでないredirect_uriは不正', () => {
    expect(validateAuthorizeParams({ client_id: 'c', redirect_uri: '/cb' })).toEqual({
      valid: false,
      message: 'redirect_uri must be an absolute URL',
    })
  })

  it('未対応のcode_challenge_methodは不正', () => {
    expect(
      validateAuthorizeParams({
        client_id: 'c',
        redirect_uri: REDIRECT_URI,
        code_challenge: 'abc',
        code_challenge_method: 'S512',
      }),
    ).toEqual({ valid: false, message: 'code_challenge_method must be S256 or plain' })
  })

  it('チャレンジがなければcode_challenge_methodは無視する', () => {
    const result = validateAuthorizeParams({ client_id: 'c', redirect_uri: REDIRECT_URI, code_challenge_method: 'S512' })
    expect(result.valid).toBe(true)
    if (result.valid) {
      expect(result.request.codeChallenge).toBeUndefined()
      expect(result.request.codeChallengeMethod).toBeUndefined()
    }
  })

  it('scopeの既定値を補う', () => {
    const result = validateAuthorizeParams({ client_id: 'c', redirect_uri: REDIRECT_URI, code_challenge: 'x', code_challenge_method: 'S256' })
    expect(result.valid && result.request.scope).toBe('mcp:tools mcp:resources')
    expect(result.valid && result.request.codeChallengeMethod).toBe('S256')
  })
})
