/**
 * MQTT Publisher - turns decode results into broker messages.
 *
 * Message building is pure; the class only hands messages to the client.
 */
import type { IClientPublishOptions } from 'mqtt'
import type { PublishRecord } from '../engine/service'
import type { DiscoveryDocument } from '../formatter/autodiscovery'
import { formatValue } from '../formatter/template'

// ============================================================================
// Types
// ============================================================================

export type QoS = 0 | 1 | 2

export interface OutboundMessage {
    topic: string
    payload: string
    qos: QoS
    retain: boolean
}

export interface PublisherOptions {
    qos: QoS
    retain: boolean
    availabilityTopic: string
}

export type AvailabilityState = 'online' | 'offline'

/**
 * The part of MqttClient the publisher needs
 */
export interface PublishClient {
    publish(topic: string, message: string, opts: IClientPublishOptions): unknown
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * One message per decoded field, payload rendered with formatValue
 */
export function recordMessages(records: readonly PublishRecord[], options: PublisherOptions): OutboundMessage[] {
    return records.map(record => ({
        topic: record.topic,
        payload: formatValue(record.value),
        qos: options.qos,
        retain: options.retain,
    }))
}

/**
 * Discovery documents are always retained so late subscribers see them
 */
export function discoveryMessages(docs: readonly DiscoveryDocument[], options: PublisherOptions): OutboundMessage[] {
    return docs.map(doc => ({
        topic: doc.topic,
        payload: JSON.stringify(doc.payload),
        qos: options.qos,
        retain: true,
    }))
}

export function availabilityMessage(state: AvailabilityState, options: PublisherOptions): OutboundMessage {
    return { topic: options.availabilityTopic, payload: state, qos: options.qos, retain: true }
}

// ============================================================================
// Publisher
// ============================================================================

export class MqttPublisher {
    constructor(
        private client: PublishClient,
        private options: PublisherOptions
    ) {}

    get availabilityTopic(): string {
        return this.options.availabilityTopic
    }

    publishRecords(records: readonly PublishRecord[]): number {
        return this.send(recordMessages(records, this.options))
    }

    publishDiscovery(docs: readonly DiscoveryDocument[]): number {
        return this.send(discoveryMessages(docs, this.options))
    }

    publishAvailability(state: AvailabilityState): number {
        return this.send([availabilityMessage(state, this.options)])
    }

    private send(messages: OutboundMessage[]): number {
        for (const message of messages) {
            this.client.publish(message.topic, message.payload, { qos: message.qos, retain: message.retain })
        }
        return messages.length
    }
}
