/**
 * ebus frame parser
 *
 * Turns the byte stream seen on the bus into telegrams:
 *
 *   SYN QQ ZZ PB SB NN DB1..DBn CRC ACK [NN DB1..DBn CRC ACK] SYN
 *
 * Broadcasts (ZZ = 0xFE) carry no ACK. A SYN right after the request ACK
 * ends a master-master telegram.
 */
import { ACK, BROADCAST, MAX_DATA_LENGTH, NACK, SYN, type Telegram } from '../../types/ebus'
import { requestCrc, responseCrc } from './crc'

type ParserState = 'syn' | 'src' | 'dst' | 'pb' | 'sb' | 'len' | 'data' | 'crc' | 'ack' | 'response'

export type FrameParserCallbacks = {
    /**
     * Called for every complete, CRC-checked telegram.
     */
    onTelegram?: (telegram: Telegram) => void

    /**
     * Called once a slave response passed its CRC, before the master acknowledges it.
     */
    onSlaveResponse?: (telegram: Telegram) => void

    /**
     * Called when a frame is discarded.
     */
    onDrop?: (reason: string) => void
}

export class EbusFrameParser {
    private state: ParserState = 'syn'
    private src = 0
    private dst = 0
    private pbsb = 0
    private data: number[] = []
    private response: number[] = []
    private remaining = 0
    private inResponse = false

    constructor(private readonly callbacks: FrameParserCallbacks = {}) {}

    feed(bytes: Iterable<number>): void {
        for (const byte of bytes) {
            this.step(byte & 0xff)
        }
    }

    /**
     * Forget any partial frame and wait for the next SYN
     */
    reset(): void {
        this.clearFrame()
        this.state = 'syn'
    }

    private step(byte: number): void {
        switch (this.state) {
            case 'syn':
                if (byte === SYN) this.state = 'src'
                break

            case 'src':
                if (byte !== SYN) {
                    this.src = byte
                    this.state = 'dst'
                }
                break

            case 'dst':
                this.dst = byte
                this.state = 'pb'
                break

            case 'pb':
                this.pbsb = byte << 8
                this.state = 'sb'
                break

            case 'sb':
                this.pbsb |= byte
                this.state = 'len'
                break

            case 'len':
                this.startBlock(byte)
                break

            case 'data':
                if (this.inResponse) {
                    this.response.push(byte)
                } else {
                    this.data.push(byte)
                }
                this.remaining--
                if (this.remaining === 0) this.state = 'crc'
                break

            case 'crc':
                this.checkCrc(byte)
                break

            case 'ack':
                this.handleAck(byte)
                break

            case 'response':
                if (byte === SYN) {
                    // No slave response: master-master telegram
                    this.complete()
                    this.state = 'src'
                } else {
                    this.inResponse = true
                    this.startBlock(byte)
                }
                break
        }
    }

    private startBlock(length: number): void {
        if (length > MAX_DATA_LENGTH) {
            this.drop(`data length ${length} exceeds ${MAX_DATA_LENGTH}`, length)
            return
        }
        this.remaining = length
        this.state = length === 0 ? 'crc' : 'data'
    }

    private checkCrc(byte: number): void {
        const expected = this.inResponse
            ? responseCrc(Uint8Array.from(this.response))
            : requestCrc(this.src, this.dst, this.pbsb, Uint8Array.from(this.data))

        if (expected !== byte) {
            this.drop(`CRC mismatch (expected ${expected}, got ${byte})`, byte)
            return
        }

        if (this.inResponse) {
            this.callbacks.onSlaveResponse?.(this.telegram())
        }
        this.state = 'ack'
    }

    private handleAck(byte: number): void {
        if (byte === ACK) {
            if (this.inResponse) {
                this.complete()
                this.state = 'syn'
            } else {
                this.state = 'response'
            }
            return
        }

        if (byte === SYN && this.dst === BROADCAST && !this.inResponse) {
            this.complete()
            this.state = 'src'
            return
        }

        this.drop(byte === NACK ? 'NACK received' : `expected ACK, got ${byte}`, byte)
    }

    private telegram(): Telegram {
        const telegram: Telegram = {
            src: this.src,
            dst: this.dst,
            pbsb: this.pbsb,
            data: Uint8Array.from(this.data),
        }
        if (this.inResponse) {
            telegram.response = Uint8Array.from(this.response)
        }
        return telegram
    }

    private complete(): void {
        const telegram = this.telegram()
        this.clearFrame()
        this.callbacks.onTelegram?.(telegram)
    }

    private drop(reason: string, byte: number): void {
        this.clearFrame()
        this.state = byte === SYN ? 'src' : 'syn'
        this.callbacks.onDrop?.(reason)
    }

    private clearFrame(): void {
        this.src = 0
        this.dst = 0
        this.pbsb = 0
        this.data = []
        this.response = []
        this.remaining = 0
        this.inResponse = false
    }
}
