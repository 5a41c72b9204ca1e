/**
 * Branded string type for ISO 8601 date strings (YYYY-MM-DDTHH:mm:ss.sssZ).
 * This is the storage format for every timestamp column.
 */
export type IsoDate = string & { readonly __brand: 'IsoDate' }

/**
 * Branded number type for epoch timestamps in milliseconds since 1970-01-01.
 * This is the in-memory format for every timestamp field.
 */
export type EpochDate = number & { readonly __brand: 'EpochDate' }

const MS_PER_HOUR = 60 * 60 * 1000
const MS_PER_DAY = 24 * MS_PER_HOUR

/**
 * Converts a Date object or a timestamp to an ISO 8601 date string.
 *
 * @example
 * toIsoDate(1705321845123) // '2024-01-15T12:30:45.123Z'
 */
export function toIsoDate(value: Date): IsoDate
export function toIsoDate(value: number, precision?: 'ms' | 's'): IsoDate
export function toIsoDate(value: Date | number, precision?: 'ms' | 's'): IsoDate {
  if (typeof value === 'number') {
    value = new Date(precision === 's' ? value * 1000 : value)
  }
  return value.toISOString() as IsoDate
}

/**
 * Converts a Date object or a timestamp to an epoch timestamp in milliseconds.
 */
export function toEpochDate(value: Date): EpochDate
export function toEpochDate(value: number, precision?: 'ms' | 's'): EpochDate
export function toEpochDate(value: Date | number, precision?: 'ms' | 's'): EpochDate {
  if (typeof value === 'number') {
    return (precision === 's' ? value * 1000 : value) as EpochDate
  }
  return value.getTime() as EpochDate
}

export function epochDateNow(): EpochDate {
  return Date.now() as EpochDate
}

export function isoToEpoch(isoDate: IsoDate | string): EpochDate {
  return toEpochDate(new Date(isoDate))
}

export function epochToIso(epochDate: EpochDate): IsoDate {
  return toIsoDate(new Date(epochDate))
}

/**
 * Moves an epoch timestamp back by a number of hours.
 */
export function hoursBefore(epochDate: EpochDate, hours: number): EpochDate {
  return (epochDate - hours * MS_PER_HOUR) as EpochDate
}

/**
 * Moves an epoch timestamp back by a number of days.
 */
export function daysBefore(epochDate: EpochDate, days: number): EpochDate {
  return (epochDate - days * MS_PER_DAY) as EpochDate
}

/**
 * Formats a timestamp as `YYYYMMDD_HHMMSS_mmm` in UTC.
 * Used wherever an identifier has to be derived from the time it was made.
 *
 * @example
 * compactTimestamp(1705321845123 as EpochDate) // '20240115_123045_123'
 */
export function compactTimestamp(epochDate: EpochDate): string {
  const iso = epochToIso(epochDate)
  const date = iso.slice(0, 10).replaceAll('-', '')
  const time = iso.slice(11, 19).replaceAll(':', '')
  const millis = iso.slice(20, 23)
  return `${date}_${time}_${millis}`
}
