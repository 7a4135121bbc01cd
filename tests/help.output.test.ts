import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseIntOption } from "../src/cli/context.js";
import { createProgram } from "../src/cli/program.js";

function findSubcommand(cmdName: string) {
    const program = createProgram();
    const command = program.commands.find((cmd) => cmd.name() === cmdName || cmd.aliases().includes(cmdName));
    if (!command) {
        throw new Error(`Command ${cmdName} not found`);
    }
    return command;
}

describe("help output", () => {
    it("lists the commands in the top-level help", () => {
        const program = createProgram();
        expect(program.name()).toBe("taskgate");
        const help = program.helpInformation();
        for (const name of ["plan", "run", "tail", "schema"]) {
            const pattern = new RegExp(String.raw`\n\s*${name}\b`);
            expect(help).toMatch(pattern);
        }
    });

    it("shows plan options", () => {
        const help = findSubcommand("plan").helpInformation();
        expect(help).toContain("--context <fileOrText>");
        expect(help).toContain("--max-tasks <n>");
        expect(help).toContain("--model-cmd <command>");
        expect(help).toContain("--out <file>");
    });

    it("shows run options", () => {
        const help = findSubcommand("run").helpInformation();
        for (const flag of [
            "--tasks <file>",
            "--worker <kind>",
            "--tool-endpoint <url>",
            "--lock-timeout <ms>",
            "--lock-expiry <ms>",
            "--topo-order",
            "--skip-history",
            "--working-dir <dir>",
            "--config <file>",
        ]) {
            expect(help).toContain(flag);
        }
    });

    it("shows tail filters", () => {
        const help = findSubcommand("tail").helpInformation();
        expect(help).toContain("--task <id|all>");
        expect(help).toContain("--type <csv>");
        expect(help).toContain("--duration <ms>");
    });
});

describe("numeric options", () => {
    it("accepts positive integers only", () => {
        expect(parseIntOption("250")).toBe(250);
        expect(parseIntOption(" 7 ")).toBe(7);
        for (const bad of ["abc", "x", "0", "-5", "1.5", "12ms", ""]) {
            expect(() => parseIntOption(bad)).toThrow(InvalidArgumentError);
        }
    });
});
