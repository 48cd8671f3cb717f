/**
 * Demo scene constants: surface, camera, lighting and mesh dimensions.
 * Component files import from here rather than carrying magic numbers.
 */

// ---------------------------------------------------------------------------
// Surface
// ---------------------------------------------------------------------------

export const SURFACE = {
  /** id of the <canvas> the engine draws into */
  id: 'renderCanvas',
} as const

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

export const RENDERER = {
  /** Device pixel ratio cap */
  maxPixelRatio: 2,
  clearColor: '#0b0f14',
} as const

// ---------------------------------------------------------------------------
// Camera
// ---------------------------------------------------------------------------

export const CAMERA = {
  /** Field of view in degrees */
  fov: 45,
  near: 0.1,
  far: 1000,
  /** Orbit target [x, y, z] */
  target: [0, 0, 0] as [number, number, number],

  /** Initial placement in spherical coordinates around the target */
  orbit: {
    radius: 10,
    /** Polar angle from +Y (radians) */
    polar: Math.PI / 2.5,
    /** Azimuth around +Y from +Z (radians) */
    azimuth: Math.PI / 4,
  },

  controls: {
    enableDamping: true,
    dampingFactor: 0.1,
    minDistance: 3,
    maxDistance: 40,
    /** Keep the camera above the ground plane */
    maxPolarAngle: Math.PI / 2 - 0.05,
  },
} as const

// ---------------------------------------------------------------------------
// Lighting
// ---------------------------------------------------------------------------

export const LIGHTING = {
  ambient: {
    color: '#ffffff',
    intensity: 1.2,
  },
} as const

// ---------------------------------------------------------------------------
// Meshes (scene units)
// ---------------------------------------------------------------------------

export const MESHES = {
  sphere: {
    diameter: 2,
    widthSegments: 32,
    heightSegments: 16,
    color: '#6366f1',
  },
  ground: {
    width: 6,
    height: 6,
    color: '#333333',
  },
} as const
