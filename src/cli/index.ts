/**
 * fqdn -- command-line front end for the FQDN library.
 */

import { Command } from "commander";

import { checkCommand } from "./commands/check.js";
import { wireCommand } from "./commands/wire.js";
import { decodeCommand } from "./commands/decode.js";
import { compareCommand } from "./commands/compare.js";
import { hierarchyCommand } from "./commands/hierarchy.js";

const program = new Command();

program
  .name("fqdn")
  .description("Validate, normalize and encode fully qualified domain names")
  .version("0.3.4");

// Global option: --rules/-r (falls back to FQDN_RULES, then the default set)
program.option(
  "-r, --rules <rules>",
  "Rule set: strict, default, none, or a comma-separated list of rules"
);

// ---- check -----------------------------------------------------------------
program
  .command("check <name>")
  .description("Validate a name and print its normalized form")
  .action((name: string) => {
    checkCommand(name, { rules: program.opts().rules });
  });

// ---- wire ------------------------------------------------------------------
program
  .command("wire <name>")
  .description("Print the canonical wire encoding as hex")
  .option("-s, --spaced", "Separate octets with spaces")
  .action((name: string, opts) => {
    wireCommand(name, { rules: program.opts().rules, spaced: opts.spaced });
  });

// ---- decode ----------------------------------------------------------------
program
  .command("decode <name>")
  .description("Print the Unicode rendering of a name")
  .action((name: string) => {
    decodeCommand(name, { rules: program.opts().rules });
  });

// ---- compare ---------------------------------------------------------------
program
  .command("compare <a> <b>")
  .description("Report whether a and b are equal, nested, or unrelated")
  .action((a: string, b: string) => {
    compareCommand(a, b, { rules: program.opts().rules });
  });

// ---- hierarchy -------------------------------------------------------------
program
  .command("hierarchy <name>")
  .description("Print the name and each of its ancestors")
  .action((name: string) => {
    hierarchyCommand(name, { rules: program.opts().rules });
  });

program.parse(process.argv);
