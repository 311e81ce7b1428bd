import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { ProviderMatcher } from "./services/matcher-service";
import { MatchingError, MatchValidationError } from "./errors";

const USAGE = "Usage: npm run match -- <request.json>";

export function runCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  const [requestPath] = argv;
  if (!requestPath) {
    console.error(USAGE);
    return 1;
  }

  let request: unknown;
  try {
    request = JSON.parse(fs.readFileSync(path.resolve(requestPath), "utf-8"));
  } catch (error) {
    console.error(`❌ Could not read match request from ${requestPath}:`, error instanceof Error ? error.message : error);
    return 1;
  }

  try {
    const response = ProviderMatcher.fromEnv(env).findMatches(request);
    console.log(JSON.stringify(response, null, 2));
    return 0;
  } catch (error) {
    if (error instanceof MatchValidationError) {
      console.error(`❌ ${error.message}`);
      console.error(JSON.stringify({ issues: error.issues }, null, 2));
      return 1;
    }
    if (error instanceof MatchingError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = runCli(process.argv.slice(2));
}
