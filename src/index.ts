export * from './cost-guardian'
