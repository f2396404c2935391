#!/usr/bin/env node
import { createProgram } from "./cli/index.js";
import { handleError } from "./utils/errors.js";

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => handleError(error));
