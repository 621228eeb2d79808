/**
 * fqdn compare <a> <b> -- Report how two names relate in the hierarchy.
 *
 * Prints one of: equal, subdomain (a is under b), superdomain (b is under a),
 * unrelated.
 */

import type { Fqdn } from "../../name/fqdn.js";
import { loadConfig, parseOrExit } from "../helpers.js";

export type Relation = "equal" | "subdomain" | "superdomain" | "unrelated";

export function relate(a: Fqdn, b: Fqdn): Relation {
  if (a.equals(b)) return "equal";
  if (a.isSubdomainOf(b)) return "subdomain";
  if (b.isSubdomainOf(a)) return "superdomain";
  return "unrelated";
}

export function compareCommand(a: string, b: string, options: { rules?: string }): void {
  const config = loadConfig(options.rules);
  console.log(relate(parseOrExit(a, config), parseOrExit(b, config)));
}
