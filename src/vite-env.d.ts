/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_ROUTES_URL?: string;
  readonly VITE_AIRPORTS_URL?: string;
  readonly VITE_MAP_STYLE_URL?: string;
  readonly VITE_DEFAULT_AIRPORT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
