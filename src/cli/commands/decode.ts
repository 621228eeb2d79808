/**
 * fqdn decode <name> -- Print the Unicode rendering of a name.
 */

import { FqdnError } from "../../name/errors.js";
import { cliError, loadConfig, parseOrExit } from "../helpers.js";

export function decodeCommand(name: string, options: { rules?: string }): void {
  const config = loadConfig(options.rules);
  const parsed = parseOrExit(name, config);
  let unicode: string;
  try {
    unicode = parsed.toUnicode();
  } catch (err) {
    if (err instanceof FqdnError) {
      cliError(`Cannot decode ${JSON.stringify(name)}: ${err.message}`);
    }
    throw err;
  }
  console.log(unicode);
}
