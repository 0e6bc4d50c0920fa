import { relative } from "path";
import type { InstallConfig } from "./config.js";

/**
 * Arguments for the converter, run with the working directory as cwd.
 * Both positional paths are given relative to that directory.
 *
 * @param sourceDir - extracted model directory, relative to workDir
 * @param outputDir - absolute output directory
 */
export function buildConverterArgs(
  config: Pick<InstallConfig, "inputFormat" | "outputNodeNames" | "savedModelTags">,
  workDir: string,
  sourceDir: string,
  outputDir: string
): string[] {
  const args = [`--input_format=${config.inputFormat}`];

  if (config.outputNodeNames.length > 0) {
    args.push(`--output_node_names=${config.outputNodeNames.join(",")}`);
  }
  if (config.savedModelTags.length > 0) {
    args.push(`--saved_model_tags=${config.savedModelTags.join(",")}`);
  }

  args.push(sourceDir, relative(workDir, outputDir) || ".");
  return args;
}
