import { PlaywrightSessionFactory, type BrowserSessionFactory } from '../backends/BrowserSession.js';
import { ScriptedBackend } from '../backends/ScriptedBackend.js';
import { StaticBackend } from '../backends/StaticBackend.js';
import { CaptchaSolver } from '../captcha/CaptchaSolver.js';
import { ChallengeDetector } from '../captcha/ChallengeDetector.js';
import { createSolverProvider } from '../captcha/providers/index.js';
import type { CaptchaSolverProvider } from '../captcha/types.js';
import { engineConfigFromEnv, type EngineConfig } from '../config/engine.js';
import { getEnv } from '../config/env.js';
import type { Clock } from '../lib/clock.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { MetricsCollector } from '../monitoring/metrics.js';
import { RequestRateLimiter } from '../security/rateLimit.js';
import { EngagementEngine } from './EngagementEngine.js';
import { FieldMapper } from './FieldMapper.js';
import type { FormTools } from './FormPreparation.js';
import { FormLocator } from './FormLocator.js';

export interface CreateEngineOverrides {
  /** Share one limiter between engines of the same process */
  limiter?: RequestRateLimiter;
  /** null forces "no solver configured" */
  solverProvider?: CaptchaSolverProvider | null;
  browserSessions?: BrowserSessionFactory;
  clock?: Clock;
  metrics?: MetricsCollector;
  logger?: Logger;
}

/**
 * Wire an engine from configuration. Configuration is read once here;
 * defaults come from the environment.
 */
export function createEngine(
  config: EngineConfig = engineConfigFromEnv(getEnv()),
  overrides: CreateEngineOverrides = {},
): EngagementEngine {
  const logger = overrides.logger ?? getLogger();
  const limiter = overrides.limiter ?? new RequestRateLimiter(config.rateLimits, overrides.clock);

  const provider =
    overrides.solverProvider !== undefined ? overrides.solverProvider : createSolverProvider(config.captcha);

  const locator = new FormLocator();
  const tools: FormTools = {
    locator,
    mapper: new FieldMapper(config.sender),
    detector: new ChallengeDetector(),
    solver: new CaptchaSolver(provider, config.captcha, {
      clock: overrides.clock,
      metrics: overrides.metrics,
      logger,
    }),
  };

  const scriptedBackend = config.scripted.enabled
    ? new ScriptedBackend(
        tools,
        limiter,
        overrides.browserSessions ??
          new PlaywrightSessionFactory({ headless: config.scripted.headless, timeoutMs: config.timeouts.navigationMs }),
        config.timeouts,
      )
    : undefined;

  return new EngagementEngine({
    limiter,
    locator,
    staticBackend: new StaticBackend(tools, limiter),
    scriptedBackend,
    fetchTimeoutMs: config.timeouts.fetchMs,
    metrics: overrides.metrics,
    logger,
  });
}
