/**
 * PKCE（RFC 7636）
 */
import crypto from 'crypto'
import type { CodeChallengeMethod } from '../types/oauth.types.js'

/**
 * S256のcode_challengeを計算する
 * @param verifier code_verifier
 * @returns base64url(sha256(verifier))（パディングなし）
 */
export function computeS256Challenge(verifier: string): string {
  return crypto.createHash('sha256').update(verifier).digest('base64url')
}

/**
 * code_challenge_methodとして受け付ける値か判定する
 */
export function isCodeChallengeMethod(value: unknown): value is CodeChallengeMethod {
  return value === 'S256' || value === 'plain'
}

/**
 * code_verifierを保存済みのcode_challengeと照合する
 * 方式が未指定の場合はplainとして扱う。
 * @param challenge 保存済みのcode_challenge
 * @param method 保存済みのcode_challenge_method
 * @param verifier クライアントから受け取ったcode_verifier
 * @returns 一致すればtrue
 */
export function verifyCodeChallenge(
  challenge: string,
  method: CodeChallengeMethod | null,
  verifier: string,
): boolean {
  const expected = method === 'S256' ? computeS256Challenge(verifier) : verifier
  return expected === challenge
}
