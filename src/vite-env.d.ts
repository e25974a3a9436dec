/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_ACTIVITY_CSV?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
