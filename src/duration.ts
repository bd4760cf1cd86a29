/**
 * Durations
 *
 * A Duration is a time span in whole or fractional seconds. Constructors never
 * validate; the constraint layer rejects negative or non-finite spans on write.
 */

declare const __duration: unique symbol
export type Duration = number & { readonly [__duration]: true }

export const SECONDS_PER_DAY = 86400

export function seconds(n: number): Duration {
  return n as Duration
}

export function minutes(n: number): Duration {
  return seconds(n * 60)
}

export function hours(n: number): Duration {
  return seconds(n * 3600)
}

export function days(n: number): Duration {
  return seconds(n * SECONDS_PER_DAY)
}

export function isValidDuration(value: unknown): value is Duration {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
}

/**
 * Whole 24-hour days spanned by `d`, rounded up, never fewer than one.
 */
export function wholeDaysAtLeastOne(d: Duration): number {
  return Math.max(1, Math.ceil(d / SECONDS_PER_DAY))
}

export function formatDuration(d: Duration): string {
  const total = Math.round(d)
  const dayCount = Math.floor(total / SECONDS_PER_DAY)
  const rest = total - dayCount * SECONDS_PER_DAY
  const h = Math.floor(rest / 3600)
  const m = Math.floor((rest % 3600) / 60)
  const s = rest % 60
  const clock = `${h}:${m < 10 ? '0' : ''}${m}:${s < 10 ? '0' : ''}${s}`
  return dayCount > 0 ? `${dayCount}d ${clock}` : clock
}
