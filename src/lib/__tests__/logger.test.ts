/**
 * Unit tests for the log buffer
 */
import { PassThrough } from 'stream'
import { describe, it, expect } from 'vitest'
import { LogBuffer, createLogStream, parseLogLine, type LogEntry } from '../logger'

const createEntry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
    category: 'EBUS',
    level: 'info',
    msg: 'Connected',
    time: new Date('2026-01-15T10:30:00Z'),
    details: {},
    ...overrides,
})

describe('parseLogLine', () => {
    it('should split the category from the message', () => {
        const line = JSON.stringify({ level: 40, time: 1768473000000, msg: '[DECODE] boiler/boiler failed', field: 'x' })

        expect(parseLogLine(line)).toEqual({
            category: 'DECODE',
            level: 'warn',
            msg: 'boiler/boiler failed',
            time: new Date(1768473000000),
            details: { field: 'x' },
        })
    })

    it('should accept success messages and the custom level', () => {
        const entry = parseLogLine(JSON.stringify({ level: 25, time: 0, msg: '✓ [MQTT] Connected to broker' }))

        expect(entry?.category).toBe('MQTT')
        expect(entry?.level).toBe('success')
        expect(entry?.msg).toBe('Connected to broker')
    })

    it('should ignore lines without a category', () => {
        expect(parseLogLine(JSON.stringify({ level: 30, time: 0, msg: 'Server listening' }))).toBeNull()
    })

    it('should ignore lines that are not JSON objects', () => {
        expect(parseLogLine('not json')).toBeNull()
        expect(parseLogLine('42')).toBeNull()
    })
})

describe('LogBuffer', () => {
    it('should return the newest entries first', () => {
        const buffer = new LogBuffer()
        buffer.push(createEntry({ msg: 'first' }))
        buffer.push(createEntry({ msg: 'second' }))

        expect(buffer.query({ limit: 10 }).map(e => e.msg)).toEqual(['second', 'first'])
    })

    it('should filter by category and level', () => {
        const buffer = new LogBuffer()
        buffer.push(createEntry({ category: 'EBUS', level: 'info', msg: 'a' }))
        buffer.push(createEntry({ category: 'MQTT', level: 'warn', msg: 'b' }))
        buffer.push(createEntry({ category: 'MQTT', level: 'info', msg: 'c' }))

        expect(buffer.query({ category: ['MQTT'], limit: 10 }).map(e => e.msg)).toEqual(['c', 'b'])
        expect(buffer.query({ level: ['warn'], limit: 10 }).map(e => e.msg)).toEqual(['b'])
        expect(buffer.query({ limit: 1 }).map(e => e.msg)).toEqual(['c'])
    })

    it('should keep only the most recent entries', () => {
        const buffer = new LogBuffer(2)
        for (const msg of ['a', 'b', 'c']) {
            buffer.push(createEntry({ msg }))
        }

        expect(buffer.size()).toBe(2)
        expect(buffer.query({ limit: 10 }).map(e => e.msg)).toEqual(['c', 'b'])
    })
})

describe('createLogStream', () => {
    it('should echo every line and buffer categorised ones', async () => {
        const buffer = new LogBuffer()
        const out = new PassThrough()
        const echoed: string[] = []
        out.on('data', chunk => echoed.push(chunk.toString()))
        const stream = createLogStream(buffer, out)

        const lines = [
            JSON.stringify({ level: 30, time: 0, msg: '[PROFILE] Loaded 1 profiles' }) + '\n',
            JSON.stringify({ level: 30, time: 0, msg: 'plain' }) + '\n',
        ]
        for (const line of lines) {
            await new Promise<void>(resolve => stream.write(line, () => resolve()))
        }
        await new Promise(resolve => setImmediate(resolve))

        expect(echoed.join('')).toBe(lines.join(''))
        expect(buffer.query({ limit: 10 }).map(e => e.msg)).toEqual(['Loaded 1 profiles'])
    })
})
