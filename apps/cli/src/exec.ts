import {
  Auditor,
  DiagnosticError,
  createFsModuleHost,
  formatAuditReport,
  mergeProject,
  writeMergedFile,
  type AuditReport,
  type ModuleHost,
} from "@pyfuse/compiler";
import { getConfig } from "./config/index.js";
import type { AuditConfig, MergeConfig, PyfuseConfig } from "./config/types.js";
import { formatCliDiagnostic, type SourceReader } from "./diagnostics.js";
import { stringifyOutput } from "./output.js";

export type CliIo = {
  host: ModuleHost;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Source lookup for diagnostic snippets. */
  readSource?: SourceReader;
};

const defaultIo = (): CliIo => ({
  host: createFsModuleHost(),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
});

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const runMerge = async (config: MergeConfig, io: CliIo): Promise<number> => {
  const { host } = io;
  const entryPath = host.path.resolve(config.entry);
  const projectRoot = host.path.resolve(config.projectRoot ?? host.path.dirname(entryPath));

  try {
    const result = await mergeProject({
      entryPath,
      projectRoot,
      host,
      verify: config.verify,
      outputPath: config.out === undefined ? undefined : host.path.resolve(config.out),
    });

    if (result.audit && !result.audit.passed) {
      io.stderr(`Merged output for ${config.entry} failed verification:`);
      io.stderr(formatAuditReport(result.audit));
      return 1;
    }

    const written = await writeMergedFile({ result, host });
    io.stdout(`Merged ${result.order.length} definitions into ${written}`);
    return 0;
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    error.diagnostics.forEach((diagnostic) =>
      io.stderr(
        formatCliDiagnostic(diagnostic, {
          color: config.color,
          root: projectRoot,
          readSource: io.readSource,
        }),
      ),
    );
    return 1;
  }
};

const runAudit = async (config: AuditConfig, io: CliIo): Promise<number> => {
  const reports: AuditReport[] = [];
  let failed = false;

  for (const file of config.files) {
    let source: string;
    try {
      source = await io.host.readFile(io.host.path.resolve(file));
    } catch (error) {
      io.stderr(`Unable to read ${file}: ${formatErrorMessage(error)}`);
      failed = true;
      continue;
    }

    const auditor = new Auditor();
    if (!auditor.audit(source, file)) failed = true;
    reports.push(auditor.getReport());
  }

  if (config.json) {
    io.stdout(stringifyOutput(reports));
  } else {
    reports.forEach((report) => {
      const write = report.passed ? io.stdout : io.stderr;
      write(`${report.path}\n${formatAuditReport(report)}`);
    });
  }
  return failed ? 1 : 0;
};

/** Runs one parsed command and resolves to the process exit status. */
export const runCommand = async (
  config: PyfuseConfig,
  io: CliIo = defaultIo(),
): Promise<number> =>
  config.command === "merge" ? runMerge(config, io) : runAudit(config, io);

export const exec = () =>
  runCommand(getConfig())
    .then((status) => {
      process.exitCode = status;
    })
    .catch(errorHandler);

function errorHandler(error: unknown) {
  console.error(error);
  process.exit(1);
}
