import { z } from 'zod';
import { GroupBy } from '@league/schemas';

export const USAGE = `Usage: league <command> --config <file> [options]
       league live-once --dir <configs> [--artifacts <dir>]

Commands:
  live          one live cycle, or the live loop with --loop
  close         one flatten cycle
  orchestrate   day/night state machine until a terminal state
  nightly       league aggregation for every registered agent
  doctor        venue, arming, session and account check
  backtest      replay the configured price series through the agent
  live-once     one live cycle for every agent config in a directory

Options:
  --loop                  keep cycling (live)
  --max-steps <n>         live cycles before stopping
  --interval <minutes>    minutes between live cycles
  --flatten-at-end        flatten positions when the loop ends
  --group <agent|builder> league grouping (nightly)
  --dir <path>            directory of agent configs (live-once)
  --artifacts <path>      where last_live.json is written (live-once)

Environment:
  FROZEN_AGENTS           comma-separated agent ids that must not trade`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const Command = z.enum(['live', 'close', 'orchestrate', 'nightly', 'doctor', 'backtest', 'live-once']);
export type Command = z.infer<typeof Command>;

const Flags = z
  .object({
    config: z.string().min(1).optional(),
    dir: z.string().min(1).optional(),
    artifacts: z.string().min(1).optional(),
    loop: z.boolean().default(false),
    maxSteps: z.coerce.number().int().positive().optional(),
    interval: z.coerce.number().positive().optional(),
    flattenAtEnd: z.boolean().default(false),
    group: GroupBy.optional(),
  })
  .strict();

type Flags = z.infer<typeof Flags>;

export type CliArgs =
  | (Flags & { command: 'live-once'; dir: string })
  | (Flags & { command: Exclude<Command, 'live-once'>; config: string });

const BOOLEAN_FLAGS = new Set(['loop', 'flattenAtEnd']);

const camel = (flag: string) => flag.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  const command = Command.safeParse(first);
  if (!command.success) throw new UsageError(first ? `unknown command "${first}"` : 'missing command');

  const raw: Record<string, string | boolean> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith('--')) throw new UsageError(`unexpected argument "${token}"`);
    const body = token.slice(2);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);
    const key = camel(name);
    if (BOOLEAN_FLAGS.has(key)) {
      raw[key] = inline === undefined ? true : inline !== 'false';
    } else if (inline !== undefined) {
      raw[key] = inline;
    } else {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) throw new UsageError(`--${name} needs a value`);
      raw[key] = value;
      i += 1;
    }
  }

  const flags = Flags.safeParse(raw);
  if (!flags.success) {
    throw new UsageError(flags.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`).join('; '));
  }
  const name = command.data;
  if (name === 'live-once') {
    if (!flags.data.dir) throw new UsageError('live-once: --dir is required');
    return { ...flags.data, command: name, dir: flags.data.dir };
  }
  if (!flags.data.config) throw new UsageError(`${name}: --config is required`);
  return { ...flags.data, command: name, config: flags.data.config };
}
