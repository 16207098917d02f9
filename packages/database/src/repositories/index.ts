export * from './proposals'
export * from './routing-decisions'
export * from './aggregated-metrics'
export * from './model-scores'
export * from './validation-checks'
export * from './queue-messages'
