import { resolveFlags } from '@scene-starter/config'
import { createLogger, parseLogLevel } from '@scene-starter/logger'
import { SURFACE } from './config/scene'
import { createThreeEngine } from './engine/renderEngine'
import { startDemo, type DemoApp } from './engine/startup'

const log = createLogger({ scope: 'demo', level: parseLogLevel(import.meta.env.VITE_LOG_LEVEL) })

function start(): DemoApp {
  try {
    return startDemo({
      document,
      surfaceId: SURFACE.id,
      createEngine: createThreeEngine,
      flags: resolveFlags(import.meta.env),
      logger: log.child('startup'),
    })
  } catch (err) {
    log.fatal('startup failed', { err })
    throw err
  }
}

const app = start()

import.meta.hot?.dispose(() => {
  app.dispose()
})
