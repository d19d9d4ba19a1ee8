export {
  ComposeSessionController,
  DEFAULT_QUERY_TIMEOUT_MS,
  execCommand,
  parsePublishedPort,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type ComposeSessionControllerOptions,
} from "./compose-session-controller"
