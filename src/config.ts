export interface ParserConfig {
  /** File that receives the debug log; logging is off without one */
  logPath: string | null;
  /** Also write DEBUG lines */
  debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const logPath = env.XCBUILD_PARSER_LOG?.trim();
  return {
    logPath: logPath ? logPath : null,
    debug: env.XCBUILD_PARSER_DEBUG === '1'
  };
}
