/**
 * apiforge version, recorded in every saved configuration.
 * Keep in step with package.json.
 *
 * @module
 */

export const CLI_VERSION = "0.1.0";
