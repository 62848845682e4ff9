import fp from 'fastify-plugin'
import { config } from '../config/env'
import type { ApplianceProfile } from '../core/types/profile'
import { EbusTcpClient } from '../modules/ebus/ebusTcpClient'
import { collectRecords, decodeForProfiles, describeTelegram } from '../modules/engine/service'
import { isPresent, type PresenceState } from '../modules/presence/presenceEvaluator'
import type { Telegram } from '../types/ebus'

declare module 'fastify' {
  interface FastifyInstance {
    ebus: EbusTcpClient
    probePresence: (profile: ApplianceProfile, signal?: AbortSignal) => Promise<PresenceState>
  }
}

export default fp(async fastify => {
  const { host, port, address, timeoutMs, presenceTimeoutMs } = config.ebus

  /**
   * Decode against every active profile, log failures, publish records
   */
  function handleTelegram(telegram: Telegram): void {
    fastify.log.trace({ msg: `[EBUS] ${describeTelegram(telegram)}`, direction: 'IN' })

    for (const { appliance, outcomes } of decodeForProfiles(telegram, fastify.profiles.getAll())) {
      for (const outcome of outcomes) {
        if (outcome.kind === 'failed') {
          fastify.log.warn({
            msg: `[DECODE] ${appliance}/${outcome.circuit} "${outcome.comment}": ${outcome.error.message}`,
            appliance,
            field: outcome.error.fieldName,
            kind: outcome.error.kind,
            telegram: describeTelegram(telegram),
          })
        }
      }

      const records = collectRecords(outcomes)
      if (records.length > 0) {
        fastify.publisher.publishRecords(records)
        fastify.log.debug({
          msg: `[MQTT] Published ${records.length} values for ${appliance}`,
          direction: 'OUT',
          topics: records.map(r => r.topic),
        })
      }
    }
  }

  const client = new EbusTcpClient({
    onConnect: () => {
      fastify.log.success({ msg: `✓ [EBUS] Connected to adapter ${host}:${port}`, host, port })
    },

    onClose: () => {
      fastify.log.warn({ msg: '[EBUS] Connection closed. Reconnecting...', host, port })
      client.scheduleReconnect(host, port, timeoutMs)
    },

    onError: err => {
      fastify.log.warn({ msg: `[EBUS] Socket error: ${err.message}`, host, port })
    },

    onTelegram: handleTelegram,

    onDrop: reason => {
      fastify.log.debug({ msg: `[EBUS] Frame dropped: ${reason}` })
    },

    onAdapterSymbol: symbol => {
      if (symbol.kind === 'error') {
        fastify.log.warn({ msg: `[EBUS] Adapter reported ${symbol.source} error ${symbol.code}` })
      } else if (symbol.kind === 'resetted') {
        fastify.log.info({ msg: '[EBUS] Adapter reset' })
      }
    },
  })

  async function probePresence(profile: ApplianceProfile, signal?: AbortSignal): Promise<PresenceState> {
    const state = await isPresent(profile.presence, (request, probeSignal) => client.exchange(request, probeSignal), {
      timeoutMs: presenceTimeoutMs,
      source: address,
      signal,
      onProbeError: err => {
        fastify.log.warn({
          msg: `[PRESENCE] Probe failed for ${profile.appliance}: ${err instanceof Error ? err.message : String(err)}`,
        })
      },
    })

    fastify.log.info({ msg: `[PRESENCE] ${profile.appliance}: ${state}`, appliance: profile.appliance, state })
    return state
  }

  client.connect(host, port, timeoutMs)

  fastify.decorate('ebus', client)
  fastify.decorate('probePresence', probePresence)

  fastify.addHook('onClose', (instance, done) => {
    client.destroy()
    done()
  })
})
