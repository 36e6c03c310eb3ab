export * from './fractions'
