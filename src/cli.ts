import { exitWith } from "@txrun/cli-helpers";
import { createProgram } from "./program.js";

try {
    await createProgram().parseAsync(process.argv);
} catch (error) {
    if (error instanceof Error) {
        exitWith(1, `Error: ${error.message}`);
    } else {
        exitWith(1, "Unknown error");
    }
}
