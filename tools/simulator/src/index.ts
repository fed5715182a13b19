import { parseArgs } from 'node:util';
import { projectScoreboard } from '@science-trivia/game-core';
import { createLogger } from '@science-trivia/logger';
import { SimulatorEnvSchema } from './env';
import { DEFAULT_QUESTIONS_PATH, loadSimulationInput, runSimulation } from './simulation';

const USAGE = 'Usage: simulate <game-log.json> [--questions <pool.json>]';

async function main(): Promise<number> {
  const env = SimulatorEnvSchema.parse(process.env);
  const logger = createLogger('simulator', env);

  try {
    const { values, positionals } = parseArgs({
      args: process.argv.slice(2),
      options: { questions: { type: 'string' } },
      allowPositionals: true,
    });
    const [gameLogPath] = positionals;
    if (!gameLogPath) {
      console.error(USAGE);
      return 1;
    }

    const input = await loadSimulationInput(gameLogPath, values.questions ?? DEFAULT_QUESTIONS_PATH);
    const report = runSimulation(input, logger);

    console.log(JSON.stringify({
      phase: report.state.phase,
      tick: report.state.tick,
      rejected: report.rejections.length,
      scoreboard: projectScoreboard(report.state),
      settlement: report.settlement,
    }, null, 2));
    return 0;
  } catch (err) {
    logger.error('simulator.failed', { error: err instanceof Error ? err.message : String(err) });
    return 1;
  } finally {
    await logger.flush();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
