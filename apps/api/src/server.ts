import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDatabase } from '@campus-voice/db'
import { createApp } from './app.js'
import { ConfigError, loadConfig, type AppConfig } from './config.js'
import { errorMessage } from './lib/errors.js'
import { createLogger, log } from './lib/logger.js'
import { LlmClassificationGateway } from './services/classification.js'
import type { ComplaintStore } from './services/complaint-store.js'
import { createServices } from './services/container.js'
import { DrizzleComplaintStore } from './services/drizzle-store.js'
import { MemoryComplaintStore } from './services/memory-store.js'
import { installVoteFeedServer } from './services/realtime-ws.js'

const logger = createLogger('server')

async function openStore(config: AppConfig): Promise<ComplaintStore> {
  if (config.storage.driver === 'memory') {
    logger.warn('Using the in-memory store; data is lost on restart')
    return new MemoryComplaintStore({ retry: config.storeRetry })
  }

  const handle = createDatabase(config.storage.databaseUrl)
  await checkDatabaseConnection(handle.pool)
  logger.info('Database connection OK')
  return new DrizzleComplaintStore(handle, config.storeRetry)
}

async function main() {
  const config = loadConfig()
  const store = await openStore(config)
  const services = createServices({
    store,
    classifier: new LlmClassificationGateway(config.llm),
    emailDomain: config.authorityEmailDomain,
    sendTimeoutMs: config.realtime.sendTimeoutMs,
  })
  const app = createApp(services)

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log(`campus-voice API http://localhost:${info.port}`)
    log(`Classifier: ${config.llm.provider} (${config.llm.model})`)
  })

  const stopVoteFeed = installVoteFeedServer(server, { registry: services.registry, store })
  services.registry.startSweep(config.realtime.sweepIntervalMs)

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`${signal} received, shutting down`)

    services.registry.shutdown()
    services.dispose()
    stopVoteFeed()
    server.close()
    await store.close()
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', error)
          process.exit(1)
        })
    })
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message)
  } else {
    logger.error(`Startup failed: ${errorMessage(error)}`, error)
  }
  process.exit(1)
})
