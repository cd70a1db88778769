#!/usr/bin/env npx tsx
/**
 * Run a behavior tree against a rosbridge server until its root settles.
 * Run with: npx tsx scripts/run-tree.ts <tree.xml> [--host h] [--port p] [--config settings.yaml] [--tree id]
 */

import { NodeStatus, statusName } from '../src/engine/behavior-tree';
import { InterpreterSession, type StatusSink } from '../src/interpreter/interpreter-session';
import { InterpreterSettingsManager, type InterpreterSettings } from '../src/interpreter/interpreter-settings';
import { UserNotifier } from '../src/interpreter/user-notifications';
import { LogHandler, toError } from '../src/utilities/log-handler';

const log = new LogHandler('run-tree');

interface CliArgs {
    treeFile: string;
    treeId?: string;
    configFile: string | null;
    overrides: Partial<InterpreterSettings>;
}

function usage(): never {
    console.error('Usage: run-tree <tree.xml> [--host h] [--port p] [--config settings.yaml] [--tree id]');
    process.exit(2);
}

function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { treeFile: '', configFile: null, overrides: {} };
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = (): string => {
            const value = argv[++i];
            if (value === undefined) usage();
            return value;
        };
        switch (arg) {
        case '--host':
            args.overrides.hostname = next();
            break;
        case '--port': {
            const port = Number(next());
            if (!Number.isInteger(port)) usage();
            args.overrides.port = port;
            break;
        }
        case '--config':
            args.configFile = next();
            break;
        case '--tree':
            args.treeId = next();
            break;
        default:
            if (arg.startsWith('--') || args.treeFile !== '') usage();
            args.treeFile = arg;
        }
    }
    if (args.treeFile === '') usage();
    return args;
}

/** Prints every batch as `row:STATUS` pairs */
const consoleSink: StatusSink = {
    applyNodeStatus(treeName, changes, resetBeforeApplying) {
        const entries = changes.map(c => `${c.index}:${statusName(c.status)}`).join(' ');
        console.log(`${treeName}${resetBeforeApplying ? ' (reset)' : ''}  ${entries}`);
    },
};

async function main(): Promise<number> {
    const args = parseArgs(process.argv.slice(2));
    const settings = new InterpreterSettingsManager(args.configFile, { ...args.overrides, autorun: true });
    const notifier = new UserNotifier(({ level, source, message }) => {
        console.error(`${level.toUpperCase()} [${source}] ${message}`);
    });
    const session = new InterpreterSession({ sink: consoleSink, settings: settings.state, notifier });

    const finished = new Promise<number>(resolve => {
        session.events.on('tree:ticked', ({ result }) => {
            if (result === NodeStatus.SUCCESS) resolve(0);
            if (result === NodeStatus.FAILURE) resolve(1);
        });
        // Tick errors and connection errors both stop auto-run
        session.events.on('autorun:changed', ({ enabled }) => {
            if (!enabled) resolve(1);
        });
    });

    try {
        if (!await session.connect()) return 1;
        await session.loadTreeFromFile(args.treeFile, args.treeId);
        const code = await finished;
        log.info(`Tree finished with ${statusName(session.rootStatus)}`);
        return code;
    } finally {
        session.dispose();
        settings.dispose();
    }
}

main()
    .then(code => process.exit(code))
    .catch((e: unknown) => {
        log.error('run-tree failed', toError(e));
        process.exit(1);
    });
