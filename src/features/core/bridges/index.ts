export * from './surface-bridge'
export * from './platform-bridge'
