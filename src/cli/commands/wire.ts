/**
 * fqdn wire <name> -- Print the canonical wire encoding as hex.
 */

import { toHex } from "../../name/types.js";
import { loadConfig, parseOrExit } from "../helpers.js";

export function wireCommand(name: string, options: { rules?: string; spaced?: boolean }): void {
  const config = loadConfig(options.rules);
  const parsed = parseOrExit(name, config);
  console.log(toHex(parsed.toWire(), options.spaced ? " " : ""));
}
