import * as fs from "fs";
import { fileURLToPath } from "url";
import {
    anonymizeDirectory,
    AnonymizerError,
    DEFAULT_CATALOG,
    formatTagWithComma,
    parse,
    type BatchReport,
    type DicomElement,
} from "./index";
import {
    DEFAULT_CONCURRENCY,
    loadConfigFile,
    parseConfig,
    selectionFromConfig,
    type AnonymizerConfig,
} from "./config";

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_FILES_FAILED = 2;

export interface AnonymizeFlags {
    directory: string;
    tags?: string[];
    exclude?: string[];
    concurrency?: number;
    config?: string;
}

async function run(args: string[] = process.argv.slice(2)): Promise<number> {
    const command = args[0];

    switch (command) {
        case "anonymize": {
            const flags = parseAnonymizeArgs(args.slice(1));
            if (!flags) {
                console.error("Usage: dicom-anonymizer anonymize <directory> [--tags a,b] [--exclude a,b] [--concurrency n] [--config file.json]");
                return EXIT_FATAL;
            }
            return anonymizeCommand(flags);
        }

        case "catalog":
            printCatalog();
            return EXIT_OK;

        case "dump":
            if (!args[1]) {
                console.error("Usage: dicom-anonymizer dump <file>");
                return EXIT_FATAL;
            }
            return dumpFile(args[1]);

        case "help":
        case "--help":
        case "-h":
            printHelp();
            return EXIT_OK;

        default:
            if (command) console.error(`Unknown command: ${command}`);
            printHelp();
            return EXIT_FATAL;
    }
}

function printHelp() {
    console.log(`
dicom-anonymizer CLI v1.0.0

Commands:
  anonymize <directory>        Anonymize every file under <directory> into <directory>/anonymized.
    --tags <list>              Comma-separated tags or keywords to anonymize (default: all catalog tags).
    --exclude <list>           Comma-separated tags or keywords to leave untouched.
    --concurrency <n>          Files processed at the same time (default: ${DEFAULT_CONCURRENCY}).
    --config <file.json>       JSON configuration; flags override it.
  catalog                      List the anonymization catalog by category.
  dump <file>                  Parse and print DICOM tags from a file.
    `);
}

/**
 * Parse `anonymize` arguments; undefined when they are malformed.
 */
export function parseAnonymizeArgs(args: string[]): AnonymizeFlags | undefined {
    let directory: string | undefined;
    const flags: Omit<AnonymizeFlags, "directory"> = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const next = args[i + 1];
        switch (arg) {
            case "--tags":
            case "--exclude":
            case "--concurrency":
            case "--config":
                if (next === undefined) return undefined;
                i++;
                if (arg === "--tags") flags.tags = splitList(next);
                else if (arg === "--exclude") flags.exclude = splitList(next);
                else if (arg === "--config") flags.config = next;
                else {
                    const concurrency = Number(next);
                    if (!Number.isInteger(concurrency)) return undefined;
                    flags.concurrency = concurrency;
                }
                break;
            default:
                if (arg.startsWith("--") || directory !== undefined) return undefined;
                directory = arg;
        }
    }

    return directory === undefined ? undefined : { directory, ...flags };
}

function splitList(value: string): string[] {
    return value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

/**
 * Configuration from the optional file, with flags layered on top.
 */
export async function resolveConfig(flags: AnonymizeFlags): Promise<AnonymizerConfig> {
    const base = flags.config ? await loadConfigFile(flags.config) : parseConfig({});
    return parseConfig({
        tags: flags.tags ?? base.tags,
        exclude: flags.exclude ?? base.exclude,
        concurrency: flags.concurrency ?? base.concurrency,
    });
}

async function anonymizeCommand(flags: AnonymizeFlags): Promise<number> {
    const controller = new AbortController();
    const onSigint = () => {
        console.error("\nCancelling: waiting for files in progress...");
        controller.abort();
    };
    process.once("SIGINT", onSigint);

    try {
        const config = await resolveConfig(flags);
        const report = await anonymizeDirectory(flags.directory, {
            selection: selectionFromConfig(config),
            concurrency: config.concurrency,
            signal: controller.signal,
            onProgress: (completed, total) => {
                process.stdout.write(`\rProcessing file ${completed}/${total}`);
            },
        });
        process.stdout.write("\n");
        console.log(formatReport(report));
        return report.failed > 0 ? EXIT_FILES_FAILED : EXIT_OK;
    } catch (e) {
        if (e instanceof AnonymizerError) {
            console.error(`Error: ${e.message}`);
            return EXIT_FATAL;
        }
        throw e;
    } finally {
        process.removeListener("SIGINT", onSigint);
    }
}

/**
 * Summary shown after a batch: counts, then one line per failed file.
 */
export function formatReport(report: BatchReport): string {
    const lines = [
        `Anonymization ${report.cancelled ? "cancelled" : "complete"}! ${report.processed} of ${report.total} DICOM files were processed and saved to:`,
        `  ${report.outputDirectory}`,
        `Failed: ${report.failed}  Skipped: ${report.skipped}`,
    ];
    for (const result of report.results) {
        if (result.status === "failed") {
            lines.push(`  FAILED ${result.sourcePath}: ${result.error?.message ?? "unknown error"}`);
        }
    }
    return lines.join("\n");
}

function printCatalog() {
    for (const { category, entries } of DEFAULT_CATALOG.allCategories()) {
        console.log(`\n${category}`);
        console.log("-".repeat(50));
        for (const entry of entries) {
            console.log(`(${formatTagWithComma(entry.tag)}) [${entry.vr}] ${entry.name}`);
        }
    }
}

function dumpFile(filePath: string): number {
    try {
        const buffer = fs.readFileSync(filePath);
        const dataset = parse(new Uint8Array(buffer));

        console.log(`\nParsed ${filePath}:`);
        console.log(`Transfer Syntax: ${dataset.transferSyntax}`);
        console.log(`Total Tags: ${Object.keys(dataset.dict).length}`);
        console.log("-".repeat(50));

        const sortedTags = Object.keys(dataset.dict).sort();
        for (const tag of sortedTags) {
            const element = dataset.dict[tag];
            console.log(`(${formatTagWithComma(tag)}) [${element.vr}] : ${displayValue(tag, element, dataset.string)}`);
        }
        console.log("-".repeat(50));
        return EXIT_OK;
    } catch (e) {
        console.error(`Error parsing file: ${e instanceof Error ? e.message : String(e)}`);
        return EXIT_FATAL;
    }
}

const BINARY_VRS = new Set(["AT", "FD", "FL", "OB", "OD", "OF", "OL", "OV", "OW", "SL", "SS", "SV", "UL", "UN", "US", "UV"]);

function displayValue(tag: string, element: DicomElement, text: (tag: string) => string | undefined): string {
    if (element.items) {
        return `[Sequence: ${element.items.length} item(s)]`;
    }
    if (element.encapsulated) {
        return "[Binary Data / Fragments]";
    }
    if (BINARY_VRS.has(element.vr) && element.Value instanceof Uint8Array) {
        return `[Binary Data: ${element.Value.length} bytes]`;
    }
    const value = text(tag) ?? "";
    // Truncate long values
    return value.length > 50 ? value.substring(0, 47) + "..." : value;
}

export { run };

// Run if main
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    run().then(
        (code) => process.exit(code),
        (err) => {
            console.error(err);
            process.exit(EXIT_FATAL);
        }
    );
}
