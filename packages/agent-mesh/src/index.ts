export {
  createMessage,
  createReply,
  errorContent,
  extractText,
  messageText,
  textContent,
  toResponseContent,
  type AgentCapabilities,
  type AgentCard,
  type AgentMessage,
  type AgentSkill,
  type MessageRole,
  type ResponseContent,
} from "./agent/types.ts";
export {
  HttpAgentClient,
  DEFAULT_REACHABILITY_TIMEOUT_MS,
  DEFAULT_SEND_TIMEOUT_MS,
  type AgentClient,
  type HttpAgentClientOptions,
} from "./agent/client.ts";
export { AgentDirectory, type DirectoryEntry } from "./agent/directory.ts";
export {
  LocalAgentClient,
  createConnections,
  defineAgent,
  withLogging,
  type AgentConnections,
  type AgentHandler,
} from "./agent/handle.ts";
export * from "./routing/index.ts";
export {
  QueryProcessor,
  NO_AGENTS_ERROR,
  ROUTING_FAILED_ERROR,
  agentNotFoundError,
  dispatchError,
  invalidResponseError,
} from "./network/processor.ts";
export {
  ConversationOrchestrator,
  cancelledResult,
  stepError,
  type Conversation,
  type StartOptions,
  type TranscriptEntry,
} from "./network/conversation.ts";
export {
  AgentNetwork,
  type AgentNetworkOptions,
  type AgentStatus,
  type WorkflowCheck,
} from "./network/network.ts";
export {
  BUILTIN_AGENTS,
  createBuiltinAgent,
  createKnowledgeAgent,
  createMathAgent,
  createTravelAgent,
  createWeatherAgent,
  isBuiltinAgent,
  type BuiltinAgentName,
  type BuiltinAgentOptions,
} from "./agents/index.ts";
export { createAgentApp, startAgentServer, type RunningAgentServer } from "./daemon/server.ts";
export {
  listRegisteredAgents,
  registerAgent,
  unregisterAgent,
  type AgentRecord,
} from "./daemon/registry.ts";
export { connectHttp, connectInProcess, type ToolConnection } from "./tools/mcp-client.ts";
export { createWeatherMcpServer } from "./tools/weather-server.ts";
export { createTravelMcpServer } from "./tools/travel-server.ts";
export { createMapsMcpServer } from "./tools/maps-server.ts";
export { isToolServer, TOOL_SERVERS, type ToolServerName } from "./tools/index.ts";
export { serveMcpHttp } from "./tools/http.ts";
export { loadMeshConfig, parseMeshConfig, type MeshConfig } from "./config.ts";
export {
  AgentTransportError,
  ConversationError,
  UnknownAgentError,
  errorMessage,
} from "./errors.ts";
export { createLogger, createSilentLogger, type Logger } from "./logger.ts";
