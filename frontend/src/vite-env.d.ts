/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string;
  readonly VITE_DEFAULT_IMAGE_URL?: string;
  readonly VITE_LOG_LEVEL?: string;
}
