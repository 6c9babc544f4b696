/**
 * CLI type definitions
 */

/**
 * Global options available on all commands
 */
export type GlobalOptions = {
  url?: string;
  user?: string;
  password?: string;
  /** Skip TLS certificate verification */
  insecure?: boolean;
  json?: boolean;
  verbose?: boolean;
};
