import * as THREE from 'three'
import { OrbitControls } from 'three/examples/jsm/controls/OrbitControls.js'
import { CAMERA, LIGHTING, MESHES } from '../config/scene'
import type { RenderEngine } from './renderEngine'

export interface SceneCounts {
  cameras: number
  lights: number
  meshes: number
}

export interface DemoScene {
  readonly scene: THREE.Scene
  readonly camera: THREE.PerspectiveCamera
  readonly light: THREE.AmbientLight
  readonly sphere: THREE.Mesh
  readonly ground: THREE.Mesh
  /** Orbit controls bound to the surface, or null when user input is off. */
  readonly controls: OrbitControls | null
  /** Advance per-frame state (camera damping). */
  update(): void
  render(engine: RenderEngine): void
  /** Match the camera projection to a viewport size. Scene objects are untouched. */
  setViewport(width: number, height: number): void
  counts(): SceneCounts
  dispose(): void
}

export interface DemoSceneOptions {
  /** Attach the camera to pointer input on the surface. */
  controls: boolean
}

/** Camera position for the configured orbit, relative to the target. */
export function orbitPosition(out = new THREE.Vector3()): THREE.Vector3 {
  const { radius, polar, azimuth } = CAMERA.orbit
  return out
    .setFromSphericalCoords(radius, polar, azimuth)
    .add(new THREE.Vector3(...CAMERA.target))
}

export function buildDemoScene(surface: HTMLCanvasElement, options: DemoSceneOptions): DemoScene {
  const scene = new THREE.Scene()

  const camera = new THREE.PerspectiveCamera(CAMERA.fov, 1, CAMERA.near, CAMERA.far)
  orbitPosition(camera.position)
  camera.lookAt(...CAMERA.target)
  scene.add(camera)

  let controls: OrbitControls | null = null
  if (options.controls) {
    controls = new OrbitControls(camera, surface)
    controls.target.set(...CAMERA.target)
    controls.enableDamping = CAMERA.controls.enableDamping
    controls.dampingFactor = CAMERA.controls.dampingFactor
    controls.minDistance = CAMERA.controls.minDistance
    controls.maxDistance = CAMERA.controls.maxDistance
    controls.maxPolarAngle = CAMERA.controls.maxPolarAngle
    controls.update()
  }

  const light = new THREE.AmbientLight(LIGHTING.ambient.color, LIGHTING.ambient.intensity)
  scene.add(light)

  const radius = MESHES.sphere.diameter / 2
  const sphereGeometry = new THREE.SphereGeometry(
    radius,
    MESHES.sphere.widthSegments,
    MESHES.sphere.heightSegments,
  )
  const sphereMaterial = new THREE.MeshStandardMaterial({ color: MESHES.sphere.color })
  const sphere = new THREE.Mesh(sphereGeometry, sphereMaterial)
  sphere.name = 'sphere'
  // rest on the ground
  sphere.position.y = radius
  scene.add(sphere)

  const groundGeometry = new THREE.PlaneGeometry(MESHES.ground.width, MESHES.ground.height)
  const groundMaterial = new THREE.MeshStandardMaterial({ color: MESHES.ground.color })
  const ground = new THREE.Mesh(groundGeometry, groundMaterial)
  ground.name = 'ground'
  ground.rotation.x = -Math.PI / 2
  scene.add(ground)

  return {
    scene,
    camera,
    light,
    sphere,
    ground,
    controls,
    update: () => {
      controls?.update()
    },
    render: (engine) => engine.render(scene, camera),
    setViewport: (width, height) => {
      if (width <= 0 || height <= 0) return
      camera.aspect = width / height
      camera.updateProjectionMatrix()
    },
    counts: () => {
      const counts: SceneCounts = { cameras: 0, lights: 0, meshes: 0 }
      scene.traverse((obj) => {
        if (obj instanceof THREE.Camera) counts.cameras++
        else if (obj instanceof THREE.Light) counts.lights++
        else if (obj instanceof THREE.Mesh) counts.meshes++
      })
      return counts
    },
    dispose: () => {
      controls?.dispose()
      sphereGeometry.dispose()
      sphereMaterial.dispose()
      groundGeometry.dispose()
      groundMaterial.dispose()
      scene.clear()
    },
  }
}
