export {
  parseCliArgs,
  buildUsage,
  readStringArg,
  readStringArrayArg,
  type ParsedArgs,
  type ParseArgsOptions,
  type ParseArgsResult,
} from './args'

export { cliLogger, CliLogger, type LogLevel, type LoggerOptions } from './logger'
