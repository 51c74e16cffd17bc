/**
 * Platform types
 *
 * A platform is written `<os>-<arch>` or `<os>-<variant>-<arch>`
 * (e.g. `linux-amd64`, `linux-musl-aarch64`, `windows-amd64`).
 */

export interface Platform {
  os: string
  arch: string
  /** OS variant, e.g. `musl` */
  variant?: string | undefined
}

/** Platform string as it appears on the command line and in manifests */
export type PlatformString = `${string}-${string}`
