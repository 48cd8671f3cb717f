/** Error when the drawable surface is missing from the host document. */
export class SurfaceNotFoundError extends Error {
  constructor(public readonly surfaceId: string) {
    super(`Canvas #${surfaceId} not found`)
    this.name = 'SurfaceNotFoundError'
  }
}

/**
 * Look up the canvas the engine draws into. A missing element, or one that is
 * not a canvas, throws {@link SurfaceNotFoundError}.
 */
export function acquireSurface(doc: Document, id: string): HTMLCanvasElement {
  const el = doc.getElementById(id)
  const view = doc.defaultView
  if (!el || !view || !(el instanceof view.HTMLCanvasElement)) {
    throw new SurfaceNotFoundError(id)
  }
  return el
}
