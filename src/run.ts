import { MissingSelectionError, UnknownEntityError } from "./common/errors.js";
import { Logger } from "./logger.js";
import { analyze, getDataset, listCategories, listValues } from "./query.js";
import type { OutputWriter } from "./transports/console.js";
import { createTransport } from "./transports/index.js";
import type { RunConfig } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_REJECTED = 2;

export interface RunOptions {
  logger?: Logger;
  write?: OutputWriter;
}

export async function run(config: RunConfig, options: RunOptions = {}): Promise<number> {
  const logger = options.logger ?? new Logger({ debugEnabled: config.debug });
  const transport = createTransport(config, options.write);

  if (config.command === "categories" || !config.category) {
    await transport.sendValues(null, listCategories());
    return EXIT_OK;
  }

  const dataset = await getDataset(config.dataPath, logger);

  if (config.command === "values") {
    await transport.sendValues(config.category, listValues(dataset, config.category));
    return EXIT_OK;
  }

  try {
    const result = analyze(dataset, config.category, config.primary ?? "", config.secondary, {
      venueTopTeams: config.venueTopTeams,
      comparativeTopTeams: config.comparativeTopTeams,
      views: config.views,
      logger,
    });
    await transport.sendAnalysis(result);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof MissingSelectionError) {
      logger.warn(error.message);
      return EXIT_OK;
    }
    if (error instanceof UnknownEntityError) {
      logger.error(`Query rejected: ${error.message}`);
      return EXIT_REJECTED;
    }
    throw error;
  }
}
