import { buildApp } from './app'
import { config } from './config/env'

async function start() {
  const app = await buildApp()

  try {
    await app.listen({ port: config.api.port, host: '0.0.0.0' })

    app.log.success({
      msg: `✓ [API] Server listening on localhost:${config.api.port}`,
      url: `http://localhost:${config.api.port}`,
      documentation: `http://localhost:${config.api.port}/documentation`,
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ msg: `[API] ${signal} received, shutting down` })
      app.close().then(
        () => process.exit(0),
        err => {
          app.log.error(err)
          process.exit(1)
        }
      )
    })
  }
}

start().catch(err => {
  console.error(err)
  process.exit(1)
})
