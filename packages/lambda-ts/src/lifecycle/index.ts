export * from './classifier';
export * from './aggregator';
export * from './orchestrator';
