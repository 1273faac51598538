export * from './types'
export * from './utils'
export * from './slots'
export * from './upi'
