/**
 * 時間形式文字列を秒数に変換する関数
 *
 * 対応形式:
 *   - "1d"   : 日（1日=86400秒）
 *   - "2h"   : 時間（1時間=3600秒）
 *   - "30m"  : 分（1分=60秒）
 *   - "10s"  : 秒
 *   - 複合指定（例: "1d2h30m10s"）も可
 *   - 数値のみ（例: "120"）はそのまま秒数として扱う
 *   - 空文字や不正な形式はデフォルト値
 *
 * @param timeStr 例: "1d2h30m10s", "120", "2h"
 * @param defaultSeconds 解釈できない場合の秒数
 * @returns 秒数
 */
export function parseTimeToSeconds(timeStr: string | undefined, defaultSeconds = 3600): number {
  if (!timeStr) return defaultSeconds

  // 数値のみの場合は秒数として解釈
  if (/^\d+$/.test(timeStr)) {
    return parseInt(timeStr, 10)
  }

  // 時間表記以外の文字を含む場合はデフォルト値
  if (!/^(\d+[dhms])+$/.test(timeStr)) return defaultSeconds

  const units: Record<string, number> = { d: 86400, h: 3600, m: 60, s: 1 }
  let totalSeconds = 0
  for (const [, amount, unit] of timeStr.matchAll(/(\d+)([dhms])/g)) {
    totalSeconds += parseInt(amount, 10) * units[unit]
  }

  // "0s"のみは0秒を返す
  if (timeStr === '0s') return 0
  // それ以外で合計0秒の場合はデフォルト値
  return totalSeconds > 0 ? totalSeconds : defaultSeconds
}

/**
 * ミリ秒のタイムスタンプをUNIX秒に変換する
 * @param ms エポックミリ秒
 * @returns エポック秒（切り捨て）
 */
export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000)
}
