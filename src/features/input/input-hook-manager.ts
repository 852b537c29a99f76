/**
 * Shared input hook manager for coordinating uiohook-napi usage across modules.
 * Loads the native hook lazily, reference-counts start/stop and tracks handlers
 * per module so each module can clean up after itself.
 */

import { logger } from '../../shared/utils/logger'

const log = logger.scope('InputHook')

export interface PointerHookEvent {
  x: number
  y: number
  /** 1 = primary, 2 = secondary, 3 = middle */
  button: number
}

export interface WheelHookEvent {
  x: number
  y: number
  rotation: number
  direction: number
}

export interface HookEvents {
  mousedown: PointerHookEvent
  mouseup: PointerHookEvent
  wheel: WheelHookEvent
}

export type HookEventType = keyof HookEvents
export type HookHandler<K extends HookEventType> = (event: HookEvents[K]) => void

export interface InputHook {
  start(): void
  stop(): void
  on<K extends HookEventType>(type: K, handler: HookHandler<K>): () => void
}

type HookListeners = { [K in HookEventType]: Set<HookHandler<K>> }

/**
 * Typed listener fan-out used by hook implementations.
 */
export function createHookEmitter() {
  const listeners: HookListeners = {
    mousedown: new Set(),
    mouseup: new Set(),
    wheel: new Set()
  }

  return {
    on<K extends HookEventType>(type: K, handler: HookHandler<K>): () => void {
      const set: Set<HookHandler<K>> = listeners[type]
      set.add(handler)
      return () => {
        set.delete(handler)
      }
    },
    emit<K extends HookEventType>(type: K, event: HookEvents[K]): void {
      const set: Set<HookHandler<K>> = listeners[type]
      for (const handler of set) {
        try {
          handler(event)
        } catch (error) {
          log.error(`${type} handler failed:`, error)
        }
      }
    }
  }
}

async function loadNativeInputHook(): Promise<InputHook> {
  const { uIOhook } = await import('uiohook-napi')
  const emitter = createHookEmitter()

  uIOhook.on('mousedown', (e) => emitter.emit('mousedown', { x: e.x, y: e.y, button: Number(e.button) }))
  uIOhook.on('mouseup', (e) => emitter.emit('mouseup', { x: e.x, y: e.y, button: Number(e.button) }))
  uIOhook.on('wheel', (e) => emitter.emit('wheel', {
    x: e.x,
    y: e.y,
    rotation: Number(e.rotation),
    direction: Number(e.direction)
  }))

  return {
    start: () => uIOhook.start(),
    stop: () => uIOhook.stop(),
    on: emitter.on
  }
}

let hookFactory: () => Promise<InputHook> = loadNativeInputHook
let inputHook: InputHook | null = null
// Shared by every caller while the first load is in flight
let hookLoading: Promise<InputHook | null> | null = null
// Bumped on reset so a load started before it is discarded
let loadGeneration = 0
let referenceCount = 0

// Track which modules are using the hook
const activeModules = new Set<string>()

// Cleanup functions per event type, keyed by module name
const handlerRegistry: Record<HookEventType, Map<string, () => void>> = {
  mousedown: new Map(),
  mouseup: new Map(),
  wheel: new Map()
}

async function loadInputHook(moduleName: string, generation: number): Promise<InputHook | null> {
  try {
    const hook = await hookFactory()
    if (generation !== loadGeneration) return null
    inputHook = hook
    log.info(`Loaded for ${moduleName}`)
    return hook
  } catch (error) {
    log.error(`Failed to load for ${moduleName}:`, error)
    return null
  }
}

/**
 * Load (once) and return the input hook. Concurrent first calls share one load.
 * @returns The hook, or null when the native module is unavailable
 */
export async function getInputHook(moduleName: string): Promise<InputHook | null> {
  if (inputHook) return inputHook
  if (hookLoading) return hookLoading

  const loading = loadInputHook(moduleName, loadGeneration)
  hookLoading = loading
  try {
    return await loading
  } finally {
    if (hookLoading === loading) hookLoading = null
  }
}

/**
 * Start the hook if no other module has.
 * @returns true if started successfully or already running
 */
export async function startInputHook(moduleName: string): Promise<boolean> {
  const hook = await getInputHook(moduleName)
  if (!hook) return false

  if (activeModules.has(moduleName)) return true

  if (referenceCount === 0) {
    try {
      log.info(`Starting (first module: ${moduleName})`)
      hook.start()
    } catch (error) {
      log.error(`Failed to start for ${moduleName}:`, error)
      return false
    }
  }

  activeModules.add(moduleName)
  referenceCount++
  log.debug(`Reference count ${referenceCount} (${moduleName})`)
  return true
}

/**
 * Stop the hook once the last module using it stops.
 */
export function stopInputHook(moduleName: string): void {
  if (!activeModules.delete(moduleName)) return
  if (!inputHook || referenceCount === 0) return

  referenceCount--
  log.debug(`Reference count ${referenceCount} (stopped by ${moduleName})`)

  if (referenceCount === 0) {
    try {
      log.info(`Stopping (last module: ${moduleName})`)
      inputHook.stop()
    } catch (error) {
      log.error(`Error stopping for ${moduleName}:`, error)
    }
  }
}

/**
 * Register a handler for a module, replacing any existing one for the same event.
 * @returns false when the hook has not been loaded
 */
export function registerHandler<K extends HookEventType>(
  moduleName: string,
  eventType: K,
  handler: HookHandler<K>
): boolean {
  if (!inputHook) return false

  unregisterHandler(moduleName, eventType)
  handlerRegistry[eventType].set(moduleName, inputHook.on(eventType, handler))
  log.debug(`Registered ${eventType} handler for ${moduleName}`)
  return true
}

export function unregisterHandler(moduleName: string, eventType: HookEventType): void {
  const cleanup = handlerRegistry[eventType].get(moduleName)
  if (!cleanup) return
  cleanup()
  handlerRegistry[eventType].delete(moduleName)
}

export function unregisterAllHandlers(moduleName: string): void {
  const eventTypes: HookEventType[] = ['mousedown', 'mouseup', 'wheel']
  for (const eventType of eventTypes) {
    unregisterHandler(moduleName, eventType)
  }
}

/**
 * Replace the hook loader (a host-specific hook, or a test double).
 * Drops any loaded hook and all registrations.
 */
export function setInputHookFactory(factory: () => Promise<InputHook>): void {
  resetInputHookManager()
  hookFactory = factory
}

export function resetInputHookManager(): void {
  for (const registry of Object.values(handlerRegistry)) {
    for (const cleanup of registry.values()) cleanup()
    registry.clear()
  }
  activeModules.clear()
  referenceCount = 0
  inputHook = null
  hookLoading = null
  loadGeneration++
  hookFactory = loadNativeInputHook
}
