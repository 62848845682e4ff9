import fp from 'fastify-plugin'
import mqtt, { type MqttClient } from 'mqtt'
import { config } from '../config/env'
import { buildAutodiscovery } from '../modules/formatter/autodiscovery'
import { MqttPublisher } from '../modules/mqtt/publisher'

declare module 'fastify' {
  interface FastifyInstance {
    mqtt: MqttClient
    publisher: MqttPublisher
    publishDiscovery: () => number
  }
}

export default fp(async fastify => {
  const { broker, clientId, username, password, qos, retain, availabilityTopic } = config.mqtt

  const client = mqtt.connect(broker, {
    clientId,
    username,
    password,
    will: { topic: availabilityTopic, payload: 'offline', qos, retain: true },
  })
  const publisher = new MqttPublisher(client, { qos, retain, availabilityTopic })

  function publishDiscovery(): number {
    let count = 0
    for (const profile of fastify.profiles.getAll()) {
      count += publisher.publishDiscovery(buildAutodiscovery(profile, { availabilityTopic }))
    }
    return count
  }

  client.on('connect', () => {
    publisher.publishAvailability('online')
    const documents = publishDiscovery()

    fastify.log.success({
      msg: '✓ [MQTT] Connected to broker',
      broker,
      availabilityTopic,
      discoveryDocuments: documents,
    })
  })

  client.on('reconnect', () => {
    fastify.log.warn({ msg: '[MQTT] Reconnecting to broker', broker })
  })

  client.on('error', err => {
    fastify.log.error({
      msg: '[MQTT] Connection error',
      error: err.message,
      broker,
    })
  })

  fastify.decorate('mqtt', client)
  fastify.decorate('publisher', publisher)
  fastify.decorate('publishDiscovery', publishDiscovery)

  fastify.addHook('onClose', (instance, done) => {
    publisher.publishAvailability('offline')
    client.end(false, {}, () => done())
  })
})
