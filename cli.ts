#!/usr/bin/env -S npx tsx

/**
 * Example command line client
 *
 * Searches the content API for tags and prints their ids.
 *   npm run search -- football --api-key test-key
 */

import { Command } from "commander";
import {
  createTagSearchRepository,
  DEFAULT_SEARCH_TERM,
  getCliErrorMessage,
  runTagSearchCommand,
  type TagSearchCommandOptions,
} from "./src/adapters/in/cli/TagSearchCommand.ts";
import { loadEnv } from "./src/config/env.ts";
import { debug, error, setLogLevel } from "./src/config/logger.ts";
import { describeSetupError } from "./src/utils/errors.ts";

const program = new Command()
  .name("content-tags")
  .description("Search the content API for tags")
  .argument("[query]", "search term", DEFAULT_SEARCH_TERM)
  .option("--api-key <key>", "API key (defaults to CONTENT_API_KEY)")
  .option("--endpoint <url>", "API endpoint (defaults to CONTENT_API_ENDPOINT)")
  .action(async (query: string, options: TagSearchCommandOptions) => {
    const env = loadEnv();
    if (env.isErr()) {
      error(describeSetupError(env.error));
      process.exitCode = 1;
      return;
    }
    if (env.value.logLevel) {
      setLogLevel(env.value.logLevel);
    }

    debug("Running tag search", { query, endpoint: options.endpoint ?? env.value.endpoint });
    const repository = createTagSearchRepository(options, env.value);
    if (repository.isErr()) {
      error(getCliErrorMessage(repository.error));
      process.exitCode = 1;
      return;
    }

    const result = await runTagSearchCommand(query, repository.value);
    result.match(
      (lines) => lines.forEach((line) => console.log(line)),
      (e) => {
        error(getCliErrorMessage(e));
        process.exitCode = 1;
      },
    );
  });

program.parseAsync(process.argv).catch((e) => {
  error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
