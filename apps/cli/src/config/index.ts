import { getConfigFromCli } from "./arg-parser.js";
import type { ExpandcConfig } from "./types.js";

let config: ExpandcConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
