/**
 * fqdn check <name> -- Validate a name and print its normalized form.
 */

import { loadConfig, parseOrExit } from "../helpers.js";

export function checkCommand(name: string, options: { rules?: string }): void {
  const config = loadConfig(options.rules);
  const parsed = parseOrExit(name, config);
  console.log(parsed.key);
}
