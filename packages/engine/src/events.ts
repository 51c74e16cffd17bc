/**
 * Structured build events.
 *
 * WHY: The engine never prints. Progress leaves it as typed events that the
 * CLI renders, and that can also be appended to a JSONL file (one JSON object
 * per line) for tooling that follows a build.
 */

import { type WriteStream, createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { NodeId, PlatformString } from '@suitecraft/core'

import type { NodeStatus } from './report.js'

// ============================================================================
// Event Types
// ============================================================================

/** Base event fields included in all events */
export interface BaseEvent {
  /** Event type identifier */
  event: string
  /** ISO 8601 timestamp */
  timestamp: string
  platform: PlatformString
}

export interface TargetStartedEvent extends BaseEvent {
  event: 'target_started'
  /** Nodes scheduled for the target */
  nodes: number
}

export interface TargetFinishedEvent extends BaseEvent {
  event: 'target_finished'
  exitCode: number
  durationMs: number
}

/** Emitted when a node takes a worker slot */
export interface NodeStartedEvent extends BaseEvent {
  event: 'node_started'
  node: NodeId
}

/** Emitted once per node with its final status */
export interface NodeFinishedEvent extends BaseEvent {
  event: 'node_finished'
  node: NodeId
  status: NodeStatus
  cacheHit: boolean
  durationMs: number
  cause?: string | undefined
}

/** Emitted when a corrupt cache entry is dropped */
export interface CacheEvictedEvent extends BaseEvent {
  event: 'cache_evicted'
  node: NodeId
  cacheKey: string
  reason: string
}

export type BuildEvent =
  | TargetStartedEvent
  | TargetFinishedEvent
  | NodeStartedEvent
  | NodeFinishedEvent
  | CacheEvictedEvent

type Unstamped<E> = E extends BuildEvent ? Omit<E, 'timestamp'> : never

/** Event payload before the emitter stamps it */
export type BuildEventInput = Unstamped<BuildEvent>

export type BuildEventListener = (event: BuildEvent) => void

// ============================================================================
// Event Emitter
// ============================================================================

export interface BuildEventEmitterOptions {
  /** Path to append events to (JSONL) */
  outputPath?: string | undefined
  listeners?: BuildEventListener[] | undefined
}

export class BuildEventEmitter {
  private readonly outputPath: string | undefined
  private readonly listeners: BuildEventListener[]
  private stream: WriteStream | undefined
  private closed = false

  constructor(options: BuildEventEmitterOptions = {}) {
    this.outputPath = options.outputPath
    this.listeners = [...(options.listeners ?? [])]
  }

  /**
   * Open the JSONL file, if one was requested.
   */
  async init(): Promise<void> {
    if (this.outputPath) {
      await mkdir(dirname(this.outputPath), { recursive: true })
      this.stream = createWriteStream(this.outputPath, { flags: 'a' })
    }
  }

  on(listener: BuildEventListener): void {
    this.listeners.push(listener)
  }

  emit(input: BuildEventInput): void {
    if (this.closed) return
    const event: BuildEvent = { ...input, timestamp: new Date().toISOString() }
    for (const listener of this.listeners) {
      listener(event)
    }
    this.stream?.write(`${JSON.stringify(event)}\n`)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    if (this.stream) {
      const stream = this.stream
      await new Promise<void>((resolve, reject) => {
        stream.end((err: Error | null | undefined) => {
          if (err) reject(err)
          else resolve()
        })
      })
      this.stream = undefined
    }
  }
}

/**
 * Create an emitter and open its output file.
 */
export async function createEventEmitter(
  options: BuildEventEmitterOptions
): Promise<BuildEventEmitter> {
  const emitter = new BuildEventEmitter(options)
  await emitter.init()
  return emitter
}
