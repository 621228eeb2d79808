/**
 * fqdn hierarchy <name> -- Print the name and each ancestor, one per line.
 */

import { loadConfig, parseOrExit } from "../helpers.js";

export function hierarchyCommand(name: string, options: { rules?: string }): void {
  const config = loadConfig(options.rules);
  const parsed = parseOrExit(name, config);
  if (parsed.isRoot()) {
    console.log(parsed.toString());
    return;
  }
  for (const ancestor of parsed.hierarchy()) {
    console.log(ancestor.toString());
  }
}
