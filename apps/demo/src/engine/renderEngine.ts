import * as THREE from 'three'
import { RENDERER } from '../config/scene'

export interface SurfaceSize {
  width: number
  height: number
}

export type FrameCallback = (time: number) => void
export type ResizeHandler = () => void

/**
 * The engine context: a handle to the drawing surface and the device behind it.
 * This is the whole surface of the rendering library the demo relies on.
 */
export interface RenderEngine {
  readonly surface: HTMLCanvasElement
  /** Current CSS size of the surface. */
  size(): SurfaceSize
  /** Called once per display refresh. Replaces any previous callback; null stops the loop. */
  setFrameCallback(callback: FrameCallback | null): void
  /** Called when the surface size changes. Replaces any previous handler. */
  setResizeHandler(handler: ResizeHandler | null): void
  /** Recompute the drawing-buffer viewport. */
  resize(width: number, height: number): void
  render(scene: THREE.Scene, camera: THREE.Camera): void
  dispose(): void
}

export interface EngineOptions {
  antialias: boolean
  /** Window whose resize events drive the resize handler. Defaults to the global one. */
  window?: Window
}

export type EngineFactory = (surface: HTMLCanvasElement, options: EngineOptions) => RenderEngine

/** WebGL-backed engine context. */
export function createThreeEngine(surface: HTMLCanvasElement, options: EngineOptions): RenderEngine {
  const view = options.window ?? window
  const renderer = new THREE.WebGLRenderer({ canvas: surface, antialias: options.antialias })
  renderer.setPixelRatio(Math.min(view.devicePixelRatio, RENDERER.maxPixelRatio))
  renderer.setClearColor(RENDERER.clearColor)

  let resizeListener: ResizeHandler | null = null

  const setResizeHandler = (handler: ResizeHandler | null): void => {
    if (resizeListener) view.removeEventListener('resize', resizeListener)
    resizeListener = handler
    if (handler) view.addEventListener('resize', handler)
  }

  return {
    surface,
    size: () => ({ width: surface.clientWidth, height: surface.clientHeight }),
    setFrameCallback: (callback) => renderer.setAnimationLoop(callback),
    setResizeHandler,
    // CSS size is left to the stylesheet; only the drawing buffer follows.
    resize: (width, height) => renderer.setSize(width, height, false),
    render: (scene, camera) => renderer.render(scene, camera),
    dispose: () => {
      renderer.setAnimationLoop(null)
      setResizeHandler(null)
      renderer.dispose()
    },
  }
}
