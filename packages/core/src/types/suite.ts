/**
 * Suite manifest types
 *
 * A suite is a named collection of projects and distributions, optionally
 * importing other suites. Layout: <suite-root>/suite.toml
 */

import type { Layout } from './layout.js'
import type { OverlaySpec } from './overlay.js'
import type { Platform } from './platform.js'
import type { DependencyRef, NodeId } from './refs.js'

/** Native build flags; also the leaf type of a project overlay */
export interface NativeConfig {
  cflags: string[]
  ldflags: string[]
  ldlibs: string[]
  /** Toolchain reference, passed through to the native builder */
  toolchain?: string | undefined
}

/** Leaf type of a distribution overlay */
export interface DistributionConfig {
  layout?: Layout | undefined
}

export type NativeKind = 'shared_lib' | 'executable'

/** A buildable source unit */
export interface Project {
  kind: 'project'
  id: NodeId
  suite: string
  name: string
  subDir: string
  sourceDirs: string[]
  dependencies: DependencyRef[]
  /** References that order the build without being linked */
  buildDependencies: DependencyRef[]
  annotationProcessors: DependencyRef[]
  /** Language compliance level, e.g. `17+` */
  compliance?: string | undefined
  native?: NativeKind | undefined
  /** Shared library or executable base name */
  deliverable?: string | undefined
  platformDependent: boolean
  /** Flags used when no overlay is declared */
  config: NativeConfig
  osArch?: OverlaySpec<NativeConfig> | undefined
  /** Packages physically present in the project */
  packages: string[]
  /** Primary output filename override */
  artifact?: string | undefined
  license?: string | undefined
  description?: string | undefined
}

/** One `exports` entry, e.g. `a.b,a.c to other.module` */
export interface ModuleExport {
  packages: string[]
  to: string[]
  raw: string
}

export interface ModuleInfo {
  name: string
  exports: ModuleExport[]
  requires: string[]
}

export type DistributionType = 'archive' | 'dir'

/** A packaging unit */
export interface Distribution {
  kind: 'distribution'
  id: NodeId
  suite: string
  name: string
  subDir?: string | undefined
  type: DistributionType
  dependencies: DependencyRef[]
  distDependencies: DependencyRef[]
  /** Layout used when no overlay is declared */
  layout?: Layout | undefined
  osArch?: OverlaySpec<DistributionConfig> | undefined
  moduleInfo?: ModuleInfo | undefined
  platformDependent: boolean
  /** Platforms the distribution is built for (all when absent) */
  platforms?: Platform[] | undefined
  /** Hash manifest location inside the tree; may use <os> and <arch> */
  hashEntry?: string | undefined
  /** File-list manifest location inside the tree */
  fileListEntry?: string | undefined
  artifact?: string | undefined
  description?: string | undefined
}

export type BuildNode = Project | Distribution

export interface SuiteImport {
  name: string
  /** Imported suite lives beside the importing suite */
  subdir: boolean
}

/** Manifest-level defaults for build settings */
export interface BuildDefaults {
  jobs?: number | undefined
  targets?: string[] | undefined
  cacheDir?: string | undefined
  outputDir?: string | undefined
  toolchainPaths?: string[] | undefined
  timeout?: number | undefined
  gracePeriod?: number | undefined
}

export interface Suite {
  name: string
  version: string
  /** Semver range the engine must satisfy */
  engineVersion?: string | undefined
  /** Directory the suite was loaded from */
  root: string
  /** Manifest path (for error messages) */
  source: string
  imports: SuiteImport[]
  projects: Project[]
  distributions: Distribution[]
  build: BuildDefaults
}

/** A primary suite together with every suite it imports, transitively */
export interface SuiteSet {
  primary: Suite
  /** Suites by name, in load order (primary first) */
  suites: ReadonlyMap<string, Suite>
}
