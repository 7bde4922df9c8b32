/**
 * CLI: aricode
 *
 * Usage:
 *   aricode compress <input> <output> [--precision N] [--bytes] [--outer none|zstd] [--level N] [--verbose]
 *   aricode decompress <input> <output> [--precision N] [--verbose]
 *   aricode inspect <input>
 *   aricode profile <input> [--mode quick|deep] [--bytes]
 *
 * Precision resolves from --precision, then ARICODE_PRECISION, then 10000.
 */

import { AricodeEncoder } from './coder/encode.js';
import { AricodeDecoder } from './coder/decode.js';
import { AricodeError, InvalidOptionError } from './coder/errors.js';
import { DEFAULT_PRECISION } from './coder/format.js';
import { fractionalDigits } from './coder/metrics.js';
import { PrecisionProfiler, type PrecisionProfileResult, type ProfileMode } from './coder/profiler.js';
import type { AricodeLogger, OuterCodecName } from './coder/types.js';
import { readInputFile, writeFileAtomic } from './io.js';

export interface CliIO {
    stdout: (line: string) => void;
    stderr: (line: string) => void;
    env: Record<string, string | undefined>;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const VALUE_FLAGS = new Set(['precision', 'outer', 'level', 'mode']);
const BOOLEAN_FLAGS = new Set(['bytes', 'verbose', 'help']);

const USAGE = [
    'Usage:',
    '  aricode compress <input> <output> [--precision N] [--bytes] [--outer none|zstd] [--level N] [--verbose]',
    '  aricode decompress <input> <output> [--precision N] [--verbose]',
    '  aricode inspect <input>',
    '  aricode profile <input> [--mode quick|deep] [--bytes]',
].join('\n');

interface ParsedArgs {
    positional: string[];
    values: Map<string, string>;
    switches: Set<string>;
}

function parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const values = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }

        const [name, inline] = arg.slice(2).split('=', 2);
        if (BOOLEAN_FLAGS.has(name)) {
            switches.add(name);
        } else if (VALUE_FLAGS.has(name)) {
            const value = inline ?? args[++i];
            if (value === undefined) throw new InvalidOptionError(`--${name} needs a value`);
            values.set(name, value);
        } else {
            throw new InvalidOptionError(`Unknown option: --${name}`);
        }
    }

    return { positional, values, switches };
}

function parsePositiveInt(name: string, raw: string): number {
    if (!/^\d+$/.test(raw)) throw new InvalidOptionError(`${name} must be a positive integer, got "${raw}"`);
    return Number(raw);
}

function resolvePrecision(args: ParsedArgs, env: CliIO['env']): number {
    const flag = args.values.get('precision');
    if (flag !== undefined) return parsePositiveInt('--precision', flag);
    const fromEnv = env.ARICODE_PRECISION;
    if (fromEnv !== undefined && fromEnv !== '') return parsePositiveInt('ARICODE_PRECISION', fromEnv);
    return DEFAULT_PRECISION;
}

function parseOuter(raw: string | undefined): OuterCodecName {
    if (raw === undefined || raw === 'none') return 'none';
    if (raw === 'zstd') return 'zstd';
    throw new InvalidOptionError(`--outer must be none or zstd, got "${raw}"`);
}

function parseMode(raw: string | undefined): ProfileMode {
    if (raw === undefined || raw === 'quick') return 'quick';
    if (raw === 'deep') return 'deep';
    throw new InvalidOptionError(`--mode must be quick or deep, got "${raw}"`);
}

function requirePositional(args: ParsedArgs, count: number, command: string): string[] {
    const operands = args.positional.slice(1);
    if (operands.length !== count) {
        throw new InvalidOptionError(`${command} expects ${count} path argument(s), got ${operands.length}`);
    }
    return operands;
}

function makeLogger(io: CliIO, verbose: boolean): AricodeLogger {
    return {
        info: verbose ? (msg) => io.stderr(msg) : undefined,
        warn: (msg) => io.stderr(`warning: ${msg}`),
        error: (msg) => io.stderr(`error: ${msg}`),
    };
}

async function compress(args: ParsedArgs, io: CliIO): Promise<void> {
    const [input, output] = requirePositional(args, 2, 'compress');
    const level = args.values.get('level');
    const encoder = new AricodeEncoder({
        precision: resolvePrecision(args, io.env),
        symbolMode: args.switches.has('bytes') ? 'byte' : 'codepoint',
        outerCodec: parseOuter(args.values.get('outer')),
        compressionLevel: level === undefined ? 3 : parsePositiveInt('--level', level),
        logger: makeLogger(io, args.switches.has('verbose')),
    });

    await encoder.append(await readInputFile(input));
    const artifact = await encoder.finish();
    await writeFileAtomic(output, artifact);

    const t = encoder.getTelemetry();
    if (t) io.stdout(`compressed ${t.input_bytes} -> ${t.artifact_bytes} bytes (${t.symbols} symbols, precision ${t.precision})`);
}

async function decompress(args: ParsedArgs, io: CliIO): Promise<void> {
    const [input, output] = requirePositional(args, 2, 'decompress');
    const decoder = new AricodeDecoder(await readInputFile(input), {
        precision: resolvePrecision(args, io.env),
        logger: makeLogger(io, args.switches.has('verbose')),
    });

    const bytes = await decoder.decodeBytes();
    await writeFileAtomic(output, bytes);
    io.stdout(`decompressed ${bytes.length} bytes`);
}

async function inspect(args: ParsedArgs, io: CliIO): Promise<void> {
    const [input] = requirePositional(args, 1, 'inspect');
    const decoder = new AricodeDecoder(await readInputFile(input));
    const header = await decoder.readHeader();
    const content = await decoder.readContent();

    io.stdout(JSON.stringify({
        ...header,
        symbols: content.length,
        distinctSymbols: content.table.size,
        valueDigits: fractionalDigits(content.value.toString()),
    }, null, 2));
}

function printProfile(io: CliIO, result: PrecisionProfileResult): void {
    io.stdout(`Recommended precision: ${result.recommendedPrecision ?? '(none in range)'}`);
    io.stdout(`Entropy lower bound:   ${result.lowerBoundDigits} digits`);
    io.stdout(`Sample: ${result.meta.sampleSize} symbols, hash ${result.meta.sampleHash}`);
    io.stdout(['Precision', 'OK', 'Bytes', 'ms'].map(h => h.padStart(10)).join(''));
    for (const t of result.trials) {
        io.stdout([
            String(t.precision),
            t.ok ? 'yes' : 'no',
            String(t.outputBytes),
            t.encodeMs.toFixed(1),
        ].map(c => c.padStart(10)).join(''));
    }
}

async function profile(args: ParsedArgs, io: CliIO): Promise<void> {
    const [input] = requirePositional(args, 1, 'profile');
    const result = await PrecisionProfiler.profile(
        await readInputFile(input),
        parseMode(args.values.get('mode')),
        { symbolMode: args.switches.has('bytes') ? 'byte' : 'codepoint' },
    );
    printProfile(io, result);
}

const defaultIO: CliIO = {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    env: process.env,
};

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
    let args: ParsedArgs;
    try {
        args = parseArgs(argv);
    } catch (err: unknown) {
        io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
        io.stderr(USAGE);
        return EXIT_USAGE;
    }

    const command = args.positional[0];
    if (args.switches.has('help') || command === undefined) {
        io.stdout(USAGE);
        return command === undefined && !args.switches.has('help') ? EXIT_USAGE : EXIT_OK;
    }

    try {
        switch (command) {
            case 'compress': await compress(args, io); break;
            case 'decompress': await decompress(args, io); break;
            case 'inspect': await inspect(args, io); break;
            case 'profile': await profile(args, io); break;
            default:
                throw new InvalidOptionError(`Unknown command: ${command}`);
        }
        return EXIT_OK;
    } catch (err: unknown) {
        if (err instanceof InvalidOptionError) {
            io.stderr(`error: ${err.message}`);
            io.stderr(USAGE);
            return EXIT_USAGE;
        }
        if (err instanceof AricodeError) {
            io.stderr(`error: ${err.name}: ${err.message}`);
            return EXIT_FAILURE;
        }
        io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
        return EXIT_FAILURE;
    }
}
