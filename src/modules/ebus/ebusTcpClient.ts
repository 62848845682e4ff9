/**
 * TCP client for an ebus adapter speaking the enhanced protocol.
 * - Connects via net.Socket, reconnects on request
 * - Decodes adapter symbols and feeds received bus bytes to the frame parser
 * - Performs one master-slave exchange at a time (presence probes)
 */
import net from 'net'
import { ACK, SYN, type Telegram } from '../../types/ebus'
import type { ProbeRequest } from '../presence/presenceEvaluator'
import { requestCrc } from './crc'
import { EnhancedProtocolDecoder, EnhancedRequest, encodeEnhanced, type EnhancedSymbol } from './enhancedProtocol'
import { EbusFrameParser } from './frameParser'

/**
 * Callbacks for TCP client events.
 */
export type EbusClientCallbacks = {
    onConnect?: () => void
    onClose?: () => void
    onError?: (err: Error) => void
    onTelegram?: (telegram: Telegram) => void
    onDrop?: (reason: string) => void
    onAdapterSymbol?: (symbol: EnhancedSymbol) => void
}

/**
 * Anything the client can write to
 */
export interface ByteSink {
    write(bytes: Uint8Array): void
}

type PendingExchange = {
    request: ProbeRequest
    resolve: (telegram: Telegram | null) => void
}

type PendingArbitration = {
    resolve: (won: boolean) => void
}

const IDLE_TIMEOUT_MS = 60_000

export class EbusTcpClient {
    private socket: net.Socket | null = null
    private reconnectTimer: NodeJS.Timeout | null = null
    private readonly decoder = new EnhancedProtocolDecoder()
    private readonly parser: EbusFrameParser
    private arbitration: PendingArbitration | null = null
    private exchanging: PendingExchange | null = null
    private queue: Promise<unknown> = Promise.resolve()

    constructor(private readonly callbacks: EbusClientCallbacks = {}) {
        this.parser = new EbusFrameParser({
            onTelegram: telegram => this.handleTelegram(telegram),
            onSlaveResponse: telegram => this.handleSlaveResponse(telegram),
            onDrop: reason => this.callbacks.onDrop?.(reason),
        })
    }

    isConnected(): boolean {
        return !!this.socket && !this.socket.destroyed
    }

    /**
     * Connect to the adapter.
     *
     * @param timeoutMs - Idle timeout baseline; the socket is dropped after max(60s, timeoutMs) without data
     */
    connect(host: string, port: number, timeoutMs: number): void {
        this.destroy()

        const sock = new net.Socket()
        this.socket = sock

        sock.setNoDelay(true)
        sock.setKeepAlive(true, 30_000)
        sock.setTimeout(Math.max(IDLE_TIMEOUT_MS, timeoutMs))

        sock.on('connect', () => {
            this.callbacks.onConnect?.()
        })

        sock.on('data', (chunk: Buffer) => {
            this.receive(chunk)
        })

        sock.on('timeout', () => {
            this.callbacks.onError?.(new Error('Socket idle timeout'))
            sock.destroy(new Error('Socket idle timeout'))
        })

        sock.on('close', () => {
            this.socket = null
            this.settlePending()
            this.callbacks.onClose?.()
        })

        sock.on('error', err => {
            this.callbacks.onError?.(err)
        })

        sock.connect(port, host)
    }

    /**
     * Feed raw adapter bytes (exposed for replaying captures)
     */
    receive(chunk: Uint8Array): void {
        for (const symbol of this.decoder.decode(chunk)) {
            this.callbacks.onAdapterSymbol?.(symbol)
            switch (symbol.kind) {
                case 'received':
                    this.parser.feed([symbol.byte])
                    break
                case 'started':
                    // The adapter put our address on the bus
                    this.parser.feed([symbol.address])
                    this.settleArbitration(true)
                    break
                case 'failed':
                    this.settleArbitration(false)
                    break
                case 'resetted':
                    this.parser.reset()
                    break
                default:
                    break
            }
        }
    }

    /**
     * Send one request and wait for the slave response.
     * Resolves null when arbitration is lost, the socket is gone or `signal` aborts.
     */
    exchange(request: ProbeRequest, signal: AbortSignal): Promise<Telegram | null> {
        const run = this.queue.then(() => this.runExchange(request, signal, this.socketSink()))
        this.queue = run.catch(() => undefined)
        return run
    }

    /**
     * Schedule reconnect attempt.
     */
    scheduleReconnect(host: string, port: number, timeoutMs: number, delayMs = 5000): void {
        this.clearReconnect()
        this.reconnectTimer = setTimeout(() => {
            this.connect(host, port, timeoutMs)
        }, delayMs)
    }

    /**
     * Destroy socket and clear timers.
     */
    destroy(): void {
        this.clearReconnect()
        this.decoder.reset()
        this.parser.reset()
        this.settlePending()

        if (this.socket) {
            this.socket.removeAllListeners()
            this.socket.destroy()
            this.socket = null
        }
    }

    /**
     * Exchange over an explicit sink (the socket in production)
     */
    async runExchange(request: ProbeRequest, signal: AbortSignal, sink: ByteSink | null): Promise<Telegram | null> {
        if (!sink || signal.aborted) {
            return null
        }

        const onAbort = () => this.settlePending()
        signal.addEventListener('abort', onAbort, { once: true })

        try {
            const won = await new Promise<boolean>(resolve => {
                this.arbitration = { resolve }
                sink.write(encodeEnhanced(EnhancedRequest.START, request.src))
            })
            if (!won || signal.aborted) {
                return null
            }

            const reply = new Promise<Telegram | null>(resolve => {
                this.exchanging = { request, resolve }
            })

            const { dst, pbsb, data } = request
            const crc = requestCrc(request.src, dst, pbsb, data)
            for (const byte of [dst, pbsb >> 8, pbsb & 0xff, data.length, ...data, crc]) {
                sink.write(encodeEnhanced(EnhancedRequest.SEND, byte))
            }

            const telegram = await reply
            if (telegram) {
                sink.write(encodeEnhanced(EnhancedRequest.SEND, ACK))
            }
            sink.write(encodeEnhanced(EnhancedRequest.SEND, SYN))
            return telegram
        } finally {
            signal.removeEventListener('abort', onAbort)
            this.arbitration = null
            this.exchanging = null
        }
    }

    private socketSink(): ByteSink | null {
        const sock = this.socket
        if (!sock || sock.destroyed) {
            return null
        }
        return { write: bytes => void sock.write(bytes) }
    }

    private handleTelegram(telegram: Telegram): void {
        // Master-master answer to our own request
        if (this.isOwnRequest(telegram) && !telegram.response) {
            this.settleExchange(telegram)
        }
        this.callbacks.onTelegram?.(telegram)
    }

    private handleSlaveResponse(telegram: Telegram): void {
        if (this.isOwnRequest(telegram)) {
            this.settleExchange(telegram)
        }
    }

    private isOwnRequest(telegram: Telegram): boolean {
        const pending = this.exchanging?.request
        return (
            !!pending &&
            telegram.src === pending.src &&
            telegram.dst === pending.dst &&
            telegram.pbsb === pending.pbsb
        )
    }

    private settleArbitration(won: boolean): void {
        const pending = this.arbitration
        this.arbitration = null
        pending?.resolve(won)
    }

    private settleExchange(telegram: Telegram | null): void {
        const pending = this.exchanging
        this.exchanging = null
        pending?.resolve(telegram)
    }

    private settlePending(): void {
        this.settleArbitration(false)
        this.settleExchange(null)
    }

    private clearReconnect(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = null
        }
    }
}
