import { DEFAULT_FLAGS, type DemoFlags } from '@scene-starter/config'
import { createLogger, type Logger } from '@scene-starter/logger'
import { SURFACE } from '../config/scene'
import { buildDemoScene, type DemoScene } from './demoScene'
import type { EngineFactory, RenderEngine } from './renderEngine'
import { acquireSurface } from './surface'

export type DemoState = 'running' | 'disposed'

export interface DemoApp {
  readonly engine: RenderEngine
  readonly scene: DemoScene
  readonly state: DemoState
  /** Stop the frame loop, drop the resize handler and release GPU resources. Idempotent. */
  dispose(): void
}

export interface StartOptions {
  document: Document
  createEngine: EngineFactory
  surfaceId?: string
  flags?: DemoFlags
  logger?: Logger
}

// One running demo per surface; a second start on the same canvas replaces the first.
const running = new WeakMap<HTMLCanvasElement, DemoApp>()

/**
 * Startup sequence: acquire the surface, create the engine context, populate
 * the scene, then hand control to the engine's frame loop.
 *
 * A missing surface throws before anything is registered.
 */
export function startDemo(options: StartOptions): DemoApp {
  const surfaceId = options.surfaceId ?? SURFACE.id
  const flags = options.flags ?? DEFAULT_FLAGS
  const log = options.logger ?? createLogger({ scope: 'startup' })

  const surface = acquireSurface(options.document, surfaceId)

  const previous = running.get(surface)
  if (previous) {
    log.info('replacing running demo', { surface: surfaceId })
    previous.dispose()
  }

  const engine = options.createEngine(surface, { antialias: flags.ENABLE_ANTIALIAS })

  let demo: DemoScene
  try {
    demo = buildDemoScene(surface, { controls: flags.ENABLE_CAMERA_CONTROLS })
  } catch (err) {
    engine.dispose()
    throw err
  }

  const onResize = (): void => {
    const { width, height } = engine.size()
    engine.resize(width, height)
    demo.setViewport(width, height)
  }

  engine.setResizeHandler(onResize)
  onResize()

  engine.setFrameCallback(() => {
    demo.update()
    demo.render(engine)
  })

  let state: DemoState = 'running'

  const app: DemoApp = {
    engine,
    scene: demo,
    get state() {
      return state
    },
    dispose: () => {
      if (state === 'disposed') return
      state = 'disposed'
      engine.setFrameCallback(null)
      engine.setResizeHandler(null)
      demo.dispose()
      engine.dispose()
      if (running.get(surface) === app) running.delete(surface)
      log.info('demo disposed', { surface: surfaceId })
    },
  }

  running.set(surface, app)
  log.info('demo running', { surface: surfaceId, ...demo.counts(), flags })
  return app
}
