export interface AppConfig {
  port: number
  publicBaseUrl: string
  /** Development mode: exposes the verification link when mail delivery fails */
  isDebug: boolean
  sessionSecret: string
  sessionMaxAgeSeconds: number
}
