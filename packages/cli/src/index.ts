import { Command } from "commander";
import { createServeCommand } from "./commands/serve.js";
import { version } from "./version.js";

const program = new Command();

program.name("mdlive").description("Live-reloading Markdown preview server").version(version);
program.addCommand(createServeCommand(), { isDefault: true });

await program.parseAsync();
