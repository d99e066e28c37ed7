import { describe, expect, it } from 'vitest'
import { computeS256Challenge, isCodeChallengeMethod, verifyCodeChallenge } from './pkce.js'

// RFC 7636 Appendix B の例
const RFC_VERIFIER = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWEoR4l4'
const RFC_CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'

describe('computeS256Challenge', () => {
  it('base64url(sha256(verifier))をパディングなしで返す', () => {
    expect(computeS256Challenge(RFC_VERIFIER)).toBe(RFC_CHALLENGE)
    expect(computeS256Challenge('abc123')).not.toContain('=')
  })
})

describe('verifyCodeChallenge', () => {
  it('S256: 一致するverifierのみ受け付ける', () => {
    expect(verifyCodeChallenge(RFC_CHALLENGE, 'S256', RFC_VERIFIER)).toBe(true)
    expect(verifyCodeChallenge(RFC_CHALLENGE, 'S256', 'wrong-verifier')).toBe(false)
  })

  it('plain: 完全一致のみ受け付ける', () => {
    expect(verifyCodeChallenge('plain-value', 'plain', 'plain-value')).toBe(true)
    expect(verifyCodeChallenge('plain-value', 'plain', 'plain-value ')).toBe(false)
  })

  it('方式未指定はplainとして扱う', () => {
    expect(verifyCodeChallenge('plain-value', null, 'plain-value')).toBe(true)
    expect(verifyCodeChallenge(RFC_CHALLENGE, null, RFC_VERIFIER)).toBe(false)
  })
})

describe('isCodeChallengeMethod', () => {
  it.each([
    ['S256', true],
    ['plain', true],
    ['s256', false],
    ['', false],
    [undefined, false],
  ])('%s → %s', (value, expected) => {
    expect(isCodeChallengeMethod(value)).toBe(expected)
  })
})
