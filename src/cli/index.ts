import { errorMessage } from "../core/errors.js";
import { createProgram } from "./program.js";

createProgram()
    .parseAsync()
    .catch((err: unknown) => {
        console.error(`[taskgate] ${errorMessage(err)}`);
        process.exit(1);
    });
