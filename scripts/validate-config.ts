#!/usr/bin/env ts-node
import { checkConfigFile } from "../src/config/check";
import { resolveConfigPath } from "../src/config/loader";

const { valid, lines } = checkConfigFile(resolveConfigPath(process.argv[2]));
lines.forEach((line) => (valid ? console.log(line) : console.error(line)));
process.exitCode = valid ? 0 : 1;
