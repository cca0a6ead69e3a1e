/**
 * Console driver for the sync engine. Reads line commands from stdin, runs them against one
 * SessionController and prints the results.
 */
import { EventEmitter } from 'events';
import { AppError, DescribeError } from './Common/Errors.js';
import { log } from './Common/Log.js';
import { EVENT_NAMES, SIDES, type DecisionStatus, type PairView, type Side } from './Domain/index.js';
import type { Engine } from './App/Boot.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import type { SessionController } from './Services/SessionController.js';

const SIDE_ALIASES: Record<string, Side> = {
    h: `hypothesis`,
    hypo: `hypothesis`,
    hypothesis: `hypothesis`,
    a: `adversarial`,
    adv: `adversarial`,
    adversarial: `adversarial`,
};

const STATUS_ALIASES: Record<string, DecisionStatus> = {
    accept: `accepted`,
    accepted: `accepted`,
    y: `accepted`,
    reject: `rejected`,
    rejected: `rejected`,
    n: `rejected`,
};

const HELP = [
    `Commands:`,
    `  login <name> <secret>`,
    `  category <name>`,
    `  decide <h|a> <accept|reject>`,
    `  save`,
    `  show | next | prev | goto <n>`,
    `  status`,
    `  quit`,
];

/** Renders a pair view as console lines. */
export function FormatPair(view: PairView | null): string[] {
    if (!view) {
        return [`No pairs in this category.`];
    }
    const text = typeof view.pair.text === `string` ? view.pair.text : ``;
    const lines = [`Pair ${view.index + 1}/${view.total}: ${view.pairKey}`];

    if (text) {
        lines.push(`  ${text}`);
    }
    for (const side of SIDES) {
        const saved = view.saved[side] ?? `-`;
        const current = view.current[side] ?? `-`;
        const source = view.sourceIds[side] ? `` : ` (source missing)`;
        lines.push(`  ${side}: ${current} [saved: ${saved}]${source}`);
    }
    return lines;
}

/**
 * Application entry point for the console.
 */
export class AnnotationApp {
    /** Input/output channel between the stdin loop and command handling. */
    private _io: EventEmitter = new EventEmitter();
    private _engine: Engine;
    private _events: MainEventBus;
    private _session: SessionController;
    private _running = false;

    /**
     * @param engine Engine - wired sync engine (see BuildEngine)
     * @param events MainEventBus - lifecycle events printed as they happen
     */
    public constructor(engine: Engine, events: MainEventBus = MAIN_EVENT_BUS) {
        this._engine = engine;
        this._events = events;
        this._session = engine.NewSession();
        this.__setupEventHandlers();
    }

    /**
     * Runs one command line and returns what should be printed.
     * @example
     * await app.HandleCommand('decide h accept'); // ['hypothesis: accepted, adversarial: -']
     */
    public async HandleCommand(line: string): Promise<string[]> {
        const [command = ``, ...args] = line.trim().split(/\s+/);

        try {
            switch (command.toLowerCase()) {
                case ``:
                    return [];
                case `help`:
                    return HELP;
                case `login`:
                    return await this.__login(args);
                case `category`:
                    return FormatPair(await this._session.SelectCategory(args[0] ?? ``));
                case `show`:
                    return FormatPair(await this._session.Current());
                case `decide`:
                    return this.__decide(args);
                case `save`:
                    return await this.__save();
                case `next`:
                case `prev`:
                    return FormatPair(await this._session.Navigate(command.toLowerCase() === `next` ? `next` : `prev`));
                case `goto`:
                    return await this.__goto(args);
                case `status`:
                    return this.__status();
                case `quit`:
                case `exit`:
                    this._running = false;
                    return [`Bye.`];
                default:
                    return [`Unknown command '${command}'. Type 'help'.`];
            }
        } catch(err) {
            if (err instanceof AppError) {
                return [`Error (${err.code}): ${err.message}`];
            }
            log.error(`Command '${command}' failed: ${DescribeError(err)}`, `App`);
            return [`Error: ${DescribeError(err)}`];
        }
    }

    /**
     * Starts the main IO loop, reading from stdin until `quit` or end of input.
     */
    public async Start(): Promise<void> {
        this._running = true;
        this._io.on(`output`, (msg: string) => {
            process.stdout.write(`${msg}\n`);
        });
        this._io.emit(`output`, `Type 'help' for commands.`);

        for await (const line of this.__readLines()) {
            for (const output of await this.HandleCommand(line)) {
                this._io.emit(`output`, output);
            }
            if (!this._running) {
                break;
            }
        }
        await this._engine.Close();
    }

    private async __login(args: string[]): Promise<string[]> {
        const [name, secret] = args;

        if (!name || !secret) {
            return [`Usage: login <name> <secret>`];
        }
        const identity = await this._session.Login(name, secret);
        return [
            `Logged in as ${identity.displayName} (${identity.categories.join(`, `)})`,
            ...FormatPair(await this._session.Current()),
        ];
    }

    private __decide(args: string[]): string[] {
        const side = SIDE_ALIASES[(args[0] ?? ``).toLowerCase()];
        const status = STATUS_ALIASES[(args[1] ?? ``).toLowerCase()];

        if (!side || !status) {
            return [`Usage: decide <h|a> <accept|reject>`];
        }
        const staged = this._session.Decide(side, status);
        return [`hypothesis: ${staged.hypothesis ?? `-`}, adversarial: ${staged.adversarial ?? `-`}`];
    }

    private async __save(): Promise<string[]> {
        const outcome = await this._session.SubmitDecision();

        if (!outcome.ok) {
            return [`Error (${outcome.error.code}): ${outcome.message}`];
        }
        return [outcome.message, ...FormatPair(await this._session.Current())];
    }

    private async __goto(args: string[]): Promise<string[]> {
        const position = Number.parseInt(args[0] ?? ``, 10);

        if (!Number.isFinite(position)) {
            return [`Usage: goto <n>`];
        }
        return FormatPair(await this._session.Navigate(position - 1));
    }

    private __status(): string[] {
        const summary = this._session.Summary();
        const metrics = this._engine.metrics.Snapshot();
        return [
            `Completed ${summary.completed}/${summary.total} (${summary.pending} pending)`,
            `Remote calls ${metrics.remoteCalls}, retries ${metrics.retries}, throttled ${metrics.rateLimitDelays}, ` +
                `cache ${metrics.cacheHits}/${metrics.cacheHits + metrics.cacheMisses}, append fallbacks ${metrics.appendFallbacks}`,
        ];
    }

    /**
     * Sets up handlers printing engine events that matter to the annotator.
     */
    private __setupEventHandlers(): void {
        this._events.On(EVENT_NAMES.storeRetry, payload => {
            this._io.emit(`output`, `Store busy (${payload.label}), retry ${payload.attempt} in ${payload.delayMs}ms`);
        });
        this._events.On(EVENT_NAMES.logAppendFallback, payload => {
            this._io.emit(`output`, `Log ${payload.fileId} written from cached content`);
        });
    }

    /**
     * Async generator to read lines from stdin.
     */
    private async *__readLines(): AsyncGenerator<string, void, unknown> {
        const readline = await import(`readline`);
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            terminal: process.stdin.isTTY === true,
        });

        try {
            for await (const line of rl) {
                yield line;
            }
        } finally {
            rl.close();
        }
    }
}
