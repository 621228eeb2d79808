/**
 * CLI helper utilities shared across commands.
 */

import { FqdnConfig } from "../config.js";
import { Fqdn } from "../name/fqdn.js";

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}

/**
 * Resolve configuration from the --rules flag (or FQDN_RULES).
 */
export function loadConfig(rules?: string): FqdnConfig {
  try {
    return new FqdnConfig({ rules: rules ?? null });
  } catch (err) {
    cliError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse a name under `config`, exiting with a readable message on failure.
 */
export function parseOrExit(name: string, config: FqdnConfig): Fqdn {
  const result = Fqdn.tryParse(name, config.parseOptions);
  if (!result.ok) {
    cliError(`Invalid FQDN ${JSON.stringify(name)}: ${result.error.message} (${result.error.code})`);
  }
  return result.value;
}
