import { createProgram } from "./cli";
import { getLog, logError } from "./shared/logger";

const log = getLog(import.meta);

log.info(`folder-agent starting on Node ${process.version}`);

try {
	await createProgram().parseAsync(process.argv);
} catch (err) {
	logError(log, err, "folder-agent crashed");
	console.error(err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
}
