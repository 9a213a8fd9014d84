import fs from "node:fs";
import path from "node:path";

// Keep settings lookups inside the workspace so tests never read the host's
// ~/.mimicode/settings.json.
const testHome = path.resolve(process.cwd(), ".tmp", "mimicode-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.MIMICODE_HOME = testHome;
delete process.env.LOG_LEVEL;
