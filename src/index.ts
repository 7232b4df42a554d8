export * from './lib/base'
export * from './lib/bytes'
export * from './lib/combinations'
export * from './lib/master'
export * from './lib/slices'
export * from './lib/strings'
export * from './lib/transform'
export * from './lib/utils'
export * from './settings'
export * from './shared/diagnostics'
export * from './shared/errors'
