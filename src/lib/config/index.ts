import { getConfigFromCli } from "./arg-parser.js";
import type { UccConfig } from "./types.js";

export type { UccConfig } from "./types.js";

let config: UccConfig | undefined = undefined;
export const getConfig = () => {
  if (config) return config;
  config = getConfigFromCli();
  return config;
};
