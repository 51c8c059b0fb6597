/**
 * Wires configuration, collaborators, gateway, prompts, store and
 * coordinator into a ResearchService.
 */

import { pipelineConfigFromApp, type AppConfig, type PipelineConfig } from "../config/index.js";
import { createCollaborators, type Collaborators } from "../collaborators/index.js";
import { CallGateway } from "../gateway/index.js";
import { PipelineCoordinator } from "../coordinator/index.js";
import { PromptLibrary, type PromptRenderer } from "../prompts/index.js";
import { FileRunStore, type RunStore } from "../store/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { ResearchService } from "./research-service.js";

export interface PipelineComponents {
  readonly config: Readonly<PipelineConfig>;
  readonly store: RunStore;
  readonly gateway: CallGateway;
  readonly coordinator: PipelineCoordinator;
  readonly service: ResearchService;
}

export interface BootstrapOverrides {
  readonly collaborators?: Collaborators;
  readonly store?: RunStore;
  readonly prompts?: PromptRenderer;
  readonly logger?: Logger;
}

export function createPipeline(
  appConfig: AppConfig,
  overrides: BootstrapOverrides = {}
): PipelineComponents {
  const config = pipelineConfigFromApp(appConfig);
  const logger = overrides.logger ?? createSilentLogger();
  const store =
    overrides.store ?? new FileRunStore(appConfig.runDir, logger.child({ component: "store" }));

  const gateway = new CallGateway({
    collaborators: overrides.collaborators ?? createCollaborators(appConfig),
    settings: config.gateway,
    model: config.model,
    logger: logger.child({ component: "gateway" }),
  });

  const coordinator = new PipelineCoordinator({
    store,
    gateway,
    prompts: overrides.prompts ?? PromptLibrary.load(),
    config,
    logger,
  });

  const service = new ResearchService({ coordinator, store, logger });
  return { config, store, gateway, coordinator, service };
}
