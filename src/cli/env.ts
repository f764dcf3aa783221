const ENV_FILE_FLAG = "--env-file";

/**
 * dotenv has to run before commander parses, so `--env-file` is read from the
 * raw arguments in either `--env-file path` or `--env-file=path` form.
 */
export function envFileArgument(argv: readonly string[]): string | undefined {
  for (const [index, arg] of argv.entries()) {
    if (arg === ENV_FILE_FLAG) return argv[index + 1];
    if (arg.startsWith(`${ENV_FILE_FLAG}=`)) return arg.slice(ENV_FILE_FLAG.length + 1);
  }
  return undefined;
}

/** The command line wins over STOCK_RELAY_ENV_FILE, then DOTENV_CONFIG_PATH. */
export function resolveEnvFile(argv: readonly string[], env: NodeJS.ProcessEnv, fallback: string): string {
  return envFileArgument(argv) || env.STOCK_RELAY_ENV_FILE || env.DOTENV_CONFIG_PATH || fallback;
}
