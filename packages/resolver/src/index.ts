/**
 * @suitecraft/resolver
 *
 * Dependency graph builder and platform overlay resolver.
 */

export { Registry, compareIds, createRegistry } from './registry.js'

export {
  type BuildGraph,
  type Edge,
  type GraphResult,
  buildGraph,
  dependenciesOf,
  dependencyClosure,
  dependents,
  getNode,
  subgraphFor,
} from './graph.js'

export { type EdgeKind, type NodeReference, nodeReferences } from './references.js'

export { constituentProjects, validateModuleInfo } from './module-info.js'

export { type OverlayMatch, type OverlayResolution, resolveOverlay } from './overlay.js'

export {
  type NodeResolution,
  type ResolvedNodeConfig,
  primaryArtifactName,
  resolveNodeConfig,
  sourceDir,
} from './node-config.js'

export {
  type GraphFormat,
  type GraphJson,
  formatGraph,
  formatGraphDot,
  formatGraphJson,
  toGraphJson,
} from './graph-format.js'
