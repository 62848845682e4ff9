import fp from 'fastify-plugin'
import { config } from '../config/env'
import { ProfileRegistry } from '../core/registry'

declare module 'fastify' {
  interface FastifyInstance {
    profiles: ProfileRegistry
  }
}

export default fp(async fastify => {
  const registry = new ProfileRegistry(config.profiles.directory)

  try {
    const profiles = await registry.loadAll()

    fastify.log.success({
      msg: `✓ [PROFILE] Loaded ${profiles.length} profiles: ${profiles.map(p => p.appliance).join(', ')}`,
      directory: config.profiles.directory,
      profiles: profiles.map(p => ({ appliance: p.appliance, origin: p.origin, circuits: p.circuits.length })),
    })
  } catch (err) {
    // An invalid profile must keep the service from starting
    fastify.log.fatal({ msg: '[PROFILE] Failed to load profiles', error: err instanceof Error ? err.message : err })
    throw err
  }

  fastify.decorate('profiles', registry)
})
