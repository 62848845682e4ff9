/**
 * ebus telegram types
 */

export type Direction = 'request' | 'response'

export interface TelegramHeader {
  src: number
  dst: number
  pbsb: number // PB << 8 | SB
}

/**
 * One bus exchange: the master request and, for master-slave telegrams,
 * the slave response data.
 */
export interface Telegram extends TelegramHeader {
  data: Uint8Array
  response?: Uint8Array
}

/**
 * A header plus the payload being matched, independent of direction.
 */
export interface Frame extends TelegramHeader {
  payload: Uint8Array
}

export const SYN = 0xaa
export const ACK = 0x00
export const NACK = 0xff
export const BROADCAST = 0xfe
export const MAX_DATA_LENGTH = 16
