import { getConfigFromCli } from "./arg-parser.js";
import type { KindredConfig } from "./types.js";

let config: KindredConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
