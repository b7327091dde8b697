// @ember/daemon: socket protocol, tool loop and entry point
export type { DaemonContext } from "./context.js";
export { parseCommandLine, requireString, optionalString, optionalCount } from "./protocol.js";
export type { Reply, RoutedCommand, HandlerName } from "./protocol.js";
export { dispatchCommand, handleSessionAction, handleConfigAction, handleSkillAction } from "./handlers/index.js";
export { runExchange, previewToolResult, MAX_TURNS, TOOL_RESULT_PREVIEW_CHARS } from "./orchestrator.js";
export type { ExchangeOptions, ExchangeResult } from "./orchestrator.js";
export { LineSplitter, serveConnection } from "./connection.js";
export type { Connection } from "./connection.js";
export { createProtocolServer } from "./server.js";
export type { ProtocolServer, ProtocolServerOptions } from "./server.js";
export { startProactiveLoop, proactiveTick, PROACTIVE_MESSAGE } from "./proactive.js";
export type { ProactiveLoop, ProactiveLoopOptions } from "./proactive.js";
export { parseDaemonArgs, USAGE } from "./args.js";
export type { DaemonArgs } from "./args.js";
export { startDaemon, main } from "./main.js";
export type { DaemonOptions, RunningDaemon } from "./main.js";
export { shellQuote, runShell } from "./tools/shell.js";
export type { ShellOptions, ShellOutput } from "./tools/shell.js";
export { createToolRunStore, isSafeRunId } from "./tools/artifacts.js";
export type { ToolRunStore, CallRecord } from "./tools/artifacts.js";
export { splitLines, formatToolSummary, pageLines } from "./tools/output.js";
export type { SummaryLimits, PageRequest } from "./tools/output.js";
export { createToolExecutor, renderExecTemplate, DEFAULT_PAGE_LIMIT } from "./tools/executor.js";
export type { ToolExecutor, ToolExecutorOptions, ToolExecution, ToolCallContext, ToolLimits, SkillLookup } from "./tools/executor.js";
