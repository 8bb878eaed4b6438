/**
 * Options accepted by every command
 */
export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};
