/**
 * Global test setup: keep diagnostic log files out of the real home directory.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

process.env.TASKHOOKS_HOME = fs.mkdtempSync(path.join(os.tmpdir(), "taskhooks-home-"));
delete process.env.TASKHOOKS_LOG_LEVEL;
