import { Command } from "commander";
import packageJson from "../../package.json" with { type: "json" };
import type { PyfuseConfig } from "./types.js";

type MergeOptions = { out?: string; verify: boolean; color: boolean };
type AuditOptions = { json?: boolean };

const colorEnabled = (flag: boolean): boolean => flag && !process.env.NO_COLOR;

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(packageJson.version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command");

export const parseConfig = (argv: readonly string[]): PyfuseConfig => {
  let config: PyfuseConfig | undefined;

  const program = createBaseCommand({
    name: "pyfuse",
    description: "Merge a multi-file Python program into one file, or audit a file",
  });

  program
    .command("merge")
    .description("merge the program reachable from an entry file")
    .argument("<entry>", "entry python file")
    .argument("[projectRoot]", "project root (default: the entry's directory)")
    .option("-o, --out <path>", "output path (default: <entry>_merged.py)")
    .option("--no-verify", "skip auditing the merged file")
    .option("--no-color", "disable ANSI colors")
    .action((entry: string, projectRoot: string | undefined, options: MergeOptions) => {
      config = {
        command: "merge",
        entry,
        projectRoot,
        out: options.out,
        verify: options.verify,
        color: colorEnabled(options.color),
      };
    });

  program
    .command("audit")
    .description("audit one or more python files")
    .argument("<files...>", "files to audit")
    .option("--json", "print the structured reports as JSON")
    .action((files: string[], options: AuditOptions) => {
      config = { command: "audit", files, json: Boolean(options.json) };
    });

  program.parse(["node", "pyfuse", ...argv]);
  return config ?? program.help({ error: true });
};

export const getConfigFromCli = (): PyfuseConfig => parseConfig(process.argv.slice(2));
