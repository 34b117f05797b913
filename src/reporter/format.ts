// src/reporter/format.ts
const UNITS = ['B', 'KB', 'MB', 'GB', 'TB']

export function humanBytes(n: number): string {
  let x = n
  for (const [i, unit] of UNITS.entries()) {
    if (x < 1024 || i === UNITS.length - 1) {
      return unit === 'B' ? `${Math.trunc(x)} B` : `${x.toFixed(1)} ${unit}`
    }
    x /= 1024
  }
  return `${n} B`
}

export function pct(numer: number, denom: number): string {
  if (denom <= 0) return '0.0%'
  return `${((numer * 100) / denom).toFixed(1)}%`
}
