/**
 * Wires the agent's components from settings: loggers, dataset tools, the
 * MCP server and the Claude service.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SessionOptions } from '../core/types.js';
import type { Settings } from '../config/settings.js';
import { createFileLogger, type StructuredLogger } from '../logging/logger.js';
import { ClaudeAgentService, type QueryFn } from '../session/claude-service.js';
import type { ReasoningService } from '../session/connection.js';
import { createDataTools } from '../tools/data-tools.js';
import { DatasetLoader } from '../tools/dataset.js';
import { DATA_SERVER_NAME, ToolRegistry } from '../tools/registry.js';
import { TurnGuard } from '../tools/turn-guard.js';
import { loadSystemPrompt } from './prompt.js';

export type Mode = 'interactive' | 'one_shot';

export interface AgentRuntime {
  runId: string;
  logger: StructuredLogger;
  toolLogger: StructuredLogger;
  guard: TurnGuard;
  registry: ToolRegistry;
  service: ReasoningService;
  session: Omit<SessionOptions, 'resume'>;
}

export interface RuntimeOverrides {
  queryFn?: QueryFn;
  systemPrompt?: string;
  console?: boolean;
}

export function createRuntime(settings: Settings, mode: Mode, overrides: RuntimeOverrides = {}): AgentRuntime {
  const runId = uuidv4();
  const logOptions = { dir: settings.logDir, level: settings.logLevel, runId, console: overrides.console };
  const logger = createFileLogger(mode, logOptions);
  const toolLogger = createFileLogger('tools', logOptions);

  const guard = new TurnGuard();
  const loader = new DatasetLoader(settings.dataPath);
  const registry = new ToolRegistry(toolLogger).registerAll(createDataTools({ loader, guard, logger: toolLogger }));

  const service = new ClaudeAgentService({
    mcpServers: { [DATA_SERVER_NAME]: registry.createMcpServer() },
    logger,
    queryFn: overrides.queryFn,
  });

  const session: Omit<SessionOptions, 'resume'> = {
    systemPrompt: overrides.systemPrompt ?? loadSystemPrompt(),
    allowedTools: registry.allowedToolNames(),
    ...(settings.model ? { model: settings.model } : {}),
    ...(mode === 'one_shot' ? { maxTurns: settings.oneShotMaxTurns } : {}),
  };

  logger.info('runtime_ready', { mode, data_path: loader.path, tools: session.allowedTools });
  return { runId, logger, toolLogger, guard, registry, service, session };
}
