/**
 * Platform parsing, formatting and naming conventions.
 */

import type { Platform, PlatformString } from './types/platform.js'

const SEGMENT_PATTERN = /^[a-z0-9_]+$/

/**
 * Parse `os-arch` or `os-variant-arch`.
 *
 * @throws Error when the string does not have two or three segments
 */
export function parsePlatform(value: string): Platform {
  const parts = value.trim().split('-')
  if (parts.length < 2 || parts.length > 3 || !parts.every((p) => SEGMENT_PATTERN.test(p))) {
    throw new Error(`Invalid platform "${value}" (expected <os>-<arch> or <os>-<variant>-<arch>)`)
  }
  const [os = '', second = '', third] = parts
  if (third === undefined) {
    return { os, arch: second }
  }
  return { os, variant: second, arch: third }
}

export function isPlatformString(value: string): value is PlatformString {
  try {
    parsePlatform(value)
    return true
  } catch {
    return false
  }
}

/** OS name including its variant (`linux-musl`) */
export function osKey(platform: Platform): string {
  return platform.variant ? `${platform.os}-${platform.variant}` : platform.os
}

export function formatPlatform(platform: Platform): PlatformString {
  return `${osKey(platform)}-${platform.arch}`
}

export function samePlatform(a: Platform, b: Platform): boolean {
  return formatPlatform(a) === formatPlatform(b)
}

const NODE_OS: Record<string, string> = {
  win32: 'windows',
  darwin: 'darwin',
  linux: 'linux',
  freebsd: 'freebsd',
  openbsd: 'openbsd',
  sunos: 'solaris',
}

const NODE_ARCH: Record<string, string> = {
  x64: 'amd64',
  arm64: 'aarch64',
  ia32: 'i386',
  riscv64: 'riscv64',
  ppc64: 'ppc64le',
  s390x: 's390x',
}

/**
 * The platform this process runs on.
 */
export function hostPlatform(
  nodePlatform: string = process.platform,
  nodeArch: string = process.arch
): Platform {
  return {
    os: NODE_OS[nodePlatform] ?? nodePlatform,
    arch: NODE_ARCH[nodeArch] ?? nodeArch,
  }
}

/**
 * Shared-library filename for `name` on an OS.
 *
 * - windows: `<name>.dll`
 * - darwin: `lib<name>.dylib`
 * - everything else: `lib<name>.so`
 */
export function libraryFileName(name: string, os: string): string {
  switch (os) {
    case 'windows':
      return `${name}.dll`
    case 'darwin':
      return `lib${name}.dylib`
    default:
      return `lib${name}.so`
  }
}

/** Executable filename for `name` on an OS */
export function executableFileName(name: string, os: string): string {
  return os === 'windows' ? `${name}.exe` : name
}
