export * from './layout.js'
export * from './overlay.js'
export * from './platform.js'
export * from './refs.js'
export * from './suite.js'
