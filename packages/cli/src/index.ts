#!/usr/bin/env node
import * as fs from "fs/promises";
import * as path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { AzulaConfig, loadConfig } from "./config";
import { tokensReport } from "./commands/tokens";
import { checkReport } from "./commands/check";

async function readInput(file: string): Promise<{ source: string; config: AzulaConfig }> {
    const filePath = path.resolve(file);
    const source = await fs.readFile(filePath, "utf-8");
    const config = loadConfig(path.dirname(filePath));
    return { source, config };
}

function fail(e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(chalk.red("Error:"), message);
    process.exitCode = 1;
}

yargs(hideBin(process.argv))
    .scriptName("azula")
    .usage("$0 <cmd> [args]")
    .command(
        "tokens <file>",
        "Print the token stream of a source file",
        (yargs) =>
            yargs
                .positional("file", {
                    describe: "Source file to tokenize",
                    type: "string",
                    demandOption: true,
                })
                .option("format", {
                    describe: "Output format",
                    choices: ["text", "json"] as const,
                })
                .option("color", {
                    describe: "Colour tokens by category",
                    type: "boolean",
                }),
        async (argv) => {
            try {
                const { source, config } = await readInput(argv.file);
                const lines = tokensReport(source, argv.file, config, {
                    format: argv.format,
                    color: argv.color,
                });
                for (const line of lines) console.log(line);
            } catch (e) {
                fail(e);
            }
        },
    )
    .command(
        "check <file>",
        "Report illegal characters and unterminated strings",
        (yargs) =>
            yargs
                .positional("file", {
                    describe: "Source file to check",
                    type: "string",
                    demandOption: true,
                })
                .option("color", {
                    describe: "Colour the problem report",
                    type: "boolean",
                }),
        async (argv) => {
            try {
                const { source, config } = await readInput(argv.file);
                const report = checkReport(source, argv.file, config, {
                    color: argv.color,
                });
                for (const line of report.lines) {
                    (report.failed ? console.error : console.log)(line);
                }
                if (report.failed) process.exitCode = 1;
            } catch (e) {
                fail(e);
            }
        },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync()
    .catch(fail);
