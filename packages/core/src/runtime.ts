import {
  DEPLOYMENT_TASKS,
  MODEL_DEVELOPMENT_TASKS,
  type CheckpointStore,
  type CrewlineConfig,
  type FileAccess,
  type ProcessRunner,
  type QualityMetrics,
  type StageCommandConfig,
  type Storage,
} from '@crewline/shared';
import {
  SqliteQualityMetrics,
  SqliteStorage,
  closeDatabase,
  initializeStore,
  type CrewlineStore,
} from '@crewline/store';
import type { AgentOptions } from './agent.js';
import { CommandAgent, IngestionAgent, QualityAgent, TransformationAgent } from './agents/index.js';
import { FileCheckpointStore } from './checkpoint.js';
import { ConfigManager, type ConfigLoadOptions } from './config-manager.js';
import {
  createDataPipelineCrew,
  createDeploymentCrew,
  createModelDevelopmentCrew,
  type Crew,
  type DataPipelineCrew,
} from './crew.js';
import type { Sleeper } from './retry.js';
import { LocalFileAccess } from './tools/file-access.js';
import { SpawnProcessRunner } from './tools/process-runner.js';
import { TraceLogger, type TraceListener } from './trace-logger.js';
import { WorkflowOrchestrator } from './workflow-orchestrator.js';

/** Collaborators to use instead of the configured defaults. */
export interface RuntimeOverrides {
  store?: CrewlineStore;
  storage?: Storage;
  files?: FileAccess;
  checkpoints?: CheckpointStore;
  metrics?: QualityMetrics;
  runner?: ProcessRunner;
  sleep?: Sleeper;
  listener?: TraceListener;
}

/**
 * Everything wired from one configuration: store, tracer, agents, crews
 * and the workflow orchestrator.
 */
export class CrewlineRuntime {
  readonly store: CrewlineStore;
  readonly tracer: TraceLogger;
  readonly checkpoints: CheckpointStore;
  readonly ingestion: IngestionAgent;
  readonly transformation: TransformationAgent;
  readonly quality: QualityAgent;
  readonly dataPipeline: DataPipelineCrew;
  readonly modelDevelopment: Crew;
  readonly deployment: Crew;
  readonly orchestrator: WorkflowOrchestrator;
  private readonly ownsStore: boolean;

  constructor(readonly config: CrewlineConfig, overrides: RuntimeOverrides = {}) {
    this.ownsStore = overrides.store === undefined;
    this.store = overrides.store ?? initializeStore(config.database.path);
    this.tracer = new TraceLogger({
      repository: config.logging.traceOutput === 'database' ? this.store.traces : undefined,
      listener: overrides.listener,
    });

    const agentOptions: AgentOptions = {
      tracer: this.tracer,
      sink: this.store.executions,
      historyLimit: config.agents.historyLimit,
    };
    const files = overrides.files ?? new LocalFileAccess();
    const runner = overrides.runner ?? new SpawnProcessRunner();
    const warehouse = new SqliteStorage({ warehousePath: config.database.warehousePath });

    this.checkpoints = overrides.checkpoints
      ?? (config.ingestion.checkpointStore === 'database' ? this.store.checkpoints : new FileCheckpointStore(files));

    this.ingestion = new IngestionAgent(
      { storage: overrides.storage ?? warehouse, files, checkpoints: this.checkpoints },
      { ...config.ingestion, sleep: overrides.sleep },
      agentOptions,
    );
    this.transformation = new TransformationAgent({ runner, files }, config.transformation, agentOptions);
    this.quality = new QualityAgent(
      { metrics: overrides.metrics ?? new SqliteQualityMetrics(warehouse) },
      config.quality,
      agentOptions,
    );

    this.dataPipeline = createDataPipelineCrew(
      { ingestion: this.ingestion, transformation: this.transformation, quality: this.quality },
      { qualityThreshold: config.quality.threshold, tracer: this.tracer },
    );

    const commandAgent = (name: string, commands: StageCommandConfig[]): CommandAgent =>
      new CommandAgent(name, { runner }, commands.find(c => c.name === name), agentOptions);

    const [training, evaluation] = MODEL_DEVELOPMENT_TASKS;
    this.modelDevelopment = createModelDevelopmentCrew(
      {
        training: commandAgent(training, config.workflow.modelDevelopment),
        evaluation: commandAgent(evaluation, config.workflow.modelDevelopment),
      },
      { tracer: this.tracer },
    );

    const [deployment, monitoring] = DEPLOYMENT_TASKS;
    this.deployment = createDeploymentCrew(
      {
        deployment: commandAgent(deployment, config.workflow.deployment),
        monitoring: commandAgent(monitoring, config.workflow.deployment),
      },
      { tracer: this.tracer },
    );

    this.orchestrator = WorkflowOrchestrator.standard(
      { dataPipeline: this.dataPipeline, modelDevelopment: this.modelDevelopment, deployment: this.deployment },
      config.workflow.gates,
      this.tracer,
    );
  }

  /** Load configuration the usual way and wire a runtime from it. */
  static async create(options: ConfigLoadOptions & RuntimeOverrides = {}): Promise<CrewlineRuntime> {
    const config = await new ConfigManager().load(options);
    return new CrewlineRuntime(config, options);
  }

  close(): void {
    if (this.ownsStore) {
      closeDatabase();
    }
  }
}
