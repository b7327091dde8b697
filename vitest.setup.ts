import fs from "node:fs";
import path from "node:path";

// Keep test writes inside the workspace rather than the real ~/.ember.
const testHome = path.resolve(process.cwd(), ".tmp", "ember-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.EMBER_HOME = testHome;
