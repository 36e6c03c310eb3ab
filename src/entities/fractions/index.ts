export * from './rational'
export * from './percent'
