export { IngestionAgent } from './ingestion-agent.js';
export type { IngestionAgentDeps, IngestionSettings } from './ingestion-agent.js';
export { TransformationAgent } from './transformation-agent.js';
export type { TransformationSettings } from './transformation-agent.js';
export { QualityAgent } from './quality-agent.js';
export type { QualitySettings } from './quality-agent.js';
export { CommandAgent } from './command-agent.js';
