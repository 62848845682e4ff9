/**
 * ebus CRC-8, polynomial 0x9B
 */

const POLYNOMIAL = 0x9b

const CRC_TABLE: Uint8Array = (() => {
    const table = new Uint8Array(256)
    for (let i = 0; i < 256; i++) {
        let crc = i
        for (let bit = 0; bit < 8; bit++) {
            crc = crc & 0x80 ? ((crc << 1) ^ POLYNOMIAL) & 0xff : (crc << 1) & 0xff
        }
        table[i] = crc
    }
    return table
})()

export function updateCrc(crc: number, value: number): number {
    return CRC_TABLE[crc & 0xff] ^ (value & 0xff)
}

export function crc8(bytes: Iterable<number>): number {
    let crc = 0
    for (const byte of bytes) {
        crc = updateCrc(crc, byte)
    }
    return crc
}

/**
 * CRC over a request: QQ ZZ PB SB NN DB1..DBn
 */
export function requestCrc(src: number, dst: number, pbsb: number, data: Uint8Array): number {
    return crc8([src, dst, pbsb >> 8, pbsb & 0xff, data.length, ...data])
}

/**
 * CRC over a slave response: NN DB1..DBn
 */
export function responseCrc(data: Uint8Array): number {
    return crc8([data.length, ...data])
}
