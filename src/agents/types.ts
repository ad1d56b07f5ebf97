/**
 * Agent Types
 * One capability shared by a closed set of analysts
 */

import type { AgentProfile } from "../core/config.js";
import type { Logger } from "../core/logger.js";
import type { IModelClient } from "../core/model-client.js";
import type { ProductIdea } from "../schemas/idea.js";
import type { AgentName, AgentReport } from "../schemas/report.js";
import type { RetrievedPassage } from "../schemas/passage.js";
import type { ISearchService } from "../tools/web-search/search-service.js";

/**
 * Per-run inputs an agent may read. Never mutated by agents.
 */
export interface AgentContext {
  readonly runId: string;
  readonly signal?: AbortSignal;
  /** Strategy passages already retrieved for this idea, when the caller has them */
  readonly strategyPassages?: readonly RetrievedPassage[];
}

/**
 * Analysis agent - total over expected failures: a dependency outage or
 * malformed model output yields an INCONCLUSIVE report, not a throw.
 * Only cancellation and programming errors escape.
 */
export interface IAnalysisAgent {
  readonly name: AgentName;
  analyze(idea: ProductIdea, context: AgentContext): Promise<AgentReport>;
}

export interface AgentDependencies {
  modelClient: IModelClient;
  /** Absent when no search provider is configured */
  search?: ISearchService;
  profiles: Readonly<Record<AgentName, AgentProfile>>;
  log?: Logger;
}
