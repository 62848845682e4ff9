import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { SchemaInvalidError } from '../../lib/errors'
import { buildAutodiscovery } from '../formatter/autodiscovery'
import { collectRecords, decodeForProfiles, describeTelegram, type DecodeOutcome } from '../engine/service'
import { fromHex } from '../pattern/bytePattern'
import type { Telegram } from '../../types/ebus'
import type { ApplianceParams, DecodeTelegramBody, OutcomeResponse } from './schema'

/**
 * Outcome as sent over HTTP (DecodeError flattened)
 */
export function toOutcomeResponse(outcome: DecodeOutcome): OutcomeResponse {
  switch (outcome.kind) {
    case 'unrecognized':
      return { kind: outcome.kind, direction: outcome.direction }
    case 'decoded':
      return {
        kind: outcome.kind,
        direction: outcome.direction,
        circuit: outcome.circuit,
        comment: outcome.comment,
        records: outcome.records.map(({ topic, value, unit, circuit, fieldName }) => ({
          topic,
          value,
          unit,
          circuit,
          fieldName,
        })),
      }
    case 'failed':
      return {
        kind: outcome.kind,
        direction: outcome.direction,
        circuit: outcome.circuit,
        comment: outcome.comment,
        error: { kind: outcome.error.kind, fieldName: outcome.error.fieldName, message: outcome.error.message },
      }
  }
}

export function toTelegram(body: DecodeTelegramBody): Telegram {
  const telegram: Telegram = {
    src: parseInt(body.src, 16),
    dst: parseInt(body.dst, 16),
    pbsb: parseInt(body.pbsb, 16),
    data: fromHex(body.data),
  }
  if (body.response !== undefined) {
    telegram.response = fromHex(body.response)
  }
  return telegram
}

export class ProfileController {
  constructor(private fastify: FastifyInstance) {}

  listProfiles = async (req: FastifyRequest, reply: FastifyReply) => {
    const profiles = this.fastify.profiles.getAll().map(profile => ({
      appliance: profile.appliance,
      bus: profile.bus,
      origin: profile.origin,
      presenceDetection: profile.presence.valid,
      autodiscovery: profile.autodiscovery?.enabled ?? false,
      circuits: profile.circuits.map(circuit => ({ name: circuit.name, messages: circuit.messages.length })),
    }))

    return { profiles, count: profiles.length }
  }

  reloadProfiles = async (req: FastifyRequest, reply: FastifyReply) => {
    try {
      const profiles = await this.fastify.profiles.reload()
      const names = profiles.map(p => p.appliance)

      this.fastify.log.success({ msg: `✓ [PROFILE] Reloaded ${names.length} profiles`, profiles: names })
      this.fastify.publishDiscovery()

      return { success: true, profiles: names, count: names.length }
    } catch (err) {
      // The previous set stays active
      if (err instanceof SchemaInvalidError) {
        this.fastify.log.error({ msg: `[PROFILE] Reload rejected: ${err.message}`, issues: err.issues })
        throw this.fastify.httpErrors.badRequest(err.message)
      }
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.fastify.log.error({ msg: `[PROFILE] Reload failed: ${errorMessage}` })
      throw this.fastify.httpErrors.internalServerError(errorMessage)
    }
  }

  getDiscovery = async (req: FastifyRequest<{ Params: ApplianceParams }>, reply: FastifyReply) => {
    const profile = this.fastify.profiles.get(req.params.appliance)
    if (!profile) {
      throw this.fastify.httpErrors.notFound(`Unknown appliance ${req.params.appliance}`)
    }

    const documents = buildAutodiscovery(profile, {
      availabilityTopic: this.fastify.publisher.availabilityTopic,
    })
    return { appliance: profile.appliance, documents }
  }

  getPresence = async (req: FastifyRequest<{ Params: ApplianceParams }>, reply: FastifyReply) => {
    const profile = this.fastify.profiles.get(req.params.appliance)
    if (!profile) {
      throw this.fastify.httpErrors.notFound(`Unknown appliance ${req.params.appliance}`)
    }

    // Stop probing when the client goes away
    const controller = new AbortController()
    const onClose = () => controller.abort()
    reply.raw.once('close', onClose)

    try {
      const state = await this.fastify.probePresence(profile, controller.signal)
      return { appliance: profile.appliance, state }
    } finally {
      reply.raw.removeListener('close', onClose)
    }
  }

  decodeTelegram = async (req: FastifyRequest<{ Body: DecodeTelegramBody }>, reply: FastifyReply) => {
    const telegram = toTelegram(req.body)
    const results = decodeForProfiles(telegram, this.fastify.profiles.getAll())

    let published = 0
    if (req.body.publish) {
      published = this.fastify.publisher.publishRecords(results.flatMap(r => collectRecords(r.outcomes)))
    }

    this.fastify.log.debug({ msg: `[API] Decoded ${describeTelegram(telegram)}`, published })

    return {
      telegram: describeTelegram(telegram),
      published,
      results: results.map(({ appliance, outcomes }) => ({
        appliance,
        outcomes: outcomes.map(toOutcomeResponse),
      })),
    }
  }
}
