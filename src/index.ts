/**
 * Tabular Agent
 *
 * Main exports for embedding the agent or driving it from tests.
 */

// Core types
export * from './core/types.js';
export * from './core/errors.js';

// Configuration
export { loadSettings, loadDotenv, checkEnvironment, type Settings } from './config/settings.js';

// Logging
export {
  StructuredLogger,
  RotatingFileSink,
  ConsoleSink,
  MemorySink,
  createLogger,
  createFileLogger,
  errorMeta,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from './logging/logger.js';

// Storage
export { SessionStore } from './storage/session-store.js';
export { saveAgentState, saveRun, loadAgentState, serializeState } from './storage/agent-state.js';
export { writeAtomic, appendLine, readLastLine, type FileOps } from './storage/atomic-file.js';

// Tools
export { DatasetLoader, parseCSV, type Dataset } from './tools/dataset.js';
export { createDataTools, type DataToolDefinition } from './tools/data-tools.js';
export { ToolRegistry, DATA_SERVER_NAME } from './tools/registry.js';
export { TurnGuard } from './tools/turn-guard.js';

// Session
export { toConversationMessage, parseBlock } from './session/messages.js';
export { MessageRenderer } from './session/renderer.js';
export { ConnectionManager, type ReasoningService, type ServiceConnection, type ConnectionState } from './session/connection.js';
export { ClaudeAgentService, InputChannel } from './session/claude-service.js';
export { InteractiveConversation, parseCommand, type InterruptReply, type OperatorIO } from './session/conversation.js';
export { AgentStateTracker, deriveIntent } from './session/state-tracker.js';

// Agents
export { runOneShot } from './agents/one-shot.js';
export { createRuntime } from './agents/runtime.js';
