import { getConfigFromCli } from "./arg-parser.js";
import type { PatlowerConfig } from "./types.js";

let config: PatlowerConfig | undefined = undefined;

export const getConfig = (): PatlowerConfig => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
