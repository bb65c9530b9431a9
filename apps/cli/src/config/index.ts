import { getConfigFromCli } from "./arg-parser.js";
import type { PyfuseConfig } from "./types.js";

let config: PyfuseConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
