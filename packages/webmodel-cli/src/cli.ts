import { Command } from "commander";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { getCliVersion } from "./lib/version.js";
import { registerInstallCommand } from "./modules/install.js";
import { registerDoctorCommand } from "./modules/doctor.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export function createProgram(): Command {
  const program = new Command()
    .name("webmodel")
    .description("Download a pretrained model archive and convert it into a web model")
    .version(getCliVersion())
    // read by initContext before parsing; declared so commander accepts them
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress spinners and progress output");

  registerInstallCommand(program);
  registerDoctorCommand(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    process.exitCode = renderUnknownError(error);
  }
}
