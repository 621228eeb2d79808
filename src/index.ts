/**
 * fqdn-kit -- Fully Qualified Domain Names as immutable, case-insensitive values.
 *
 * Top-level package exports: the name core and FqdnConfig.
 */

export * from "./name/index.js";
export { FqdnConfig } from "./config.js";
