/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string
  readonly VITE_ENABLE_ANTIALIAS?: string
  readonly VITE_ENABLE_CAMERA_CONTROLS?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
