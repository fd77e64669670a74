import { getConfig } from './config';
import { getConfigPath } from './dirs';
import { FALLBACK_JSON, renderError, toWaybarJson } from './display/waybar';
import { Executor, getExecutor } from './executor';
import { isLogLevel, logger } from './logger';
import { createProbeDependencies, runProbe } from './probe';

/**
 * Everything the command does short of writing to stdout. Resolves to exactly
 * one JSON document on every path, since the bar treats a missing line as a
 * broken widget.
 */
export async function statusJson(
  executor: Executor = getExecutor(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  try {
    const config = await getConfig(getConfigPath(env));
    // LOG_LEVEL in the environment wins over the config file
    if (!isLogLevel(env.LOG_LEVEL)) {
      logger.setLogLevel(config.logLevel);
    }
    const deps = await createProbeDependencies(config, executor);
    return toWaybarJson(await runProbe(deps));
  } catch (e) {
    logger.error('Main', 'Run failed', e);
    try {
      return toWaybarJson(renderError('Unable to fetch network data', e));
    } catch (renderFailure) {
      logger.error('Main', 'Error rendering failed', renderFailure);
      return FALLBACK_JSON;
    }
  }
}
