import os from 'os';
import path from 'path';
import { z } from 'zod';
import { hash as sha256 } from '@stablelib/sha256';
import { NodeAddr, PeerId, Topic } from '../shared/ids';
import { ValidationError } from '../shared/errors';

const configSchema = z.object({
  dataDir: z.string().min(1),
  bindAddr: z.string().regex(/^\[?[^\s\]]+\]?:\d{1,5}$/, 'expected host:port'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']),
  transport: z.enum(['websocket', 'memory']),
  topic: z.string().min(1),
  connect: z.array(z.string()),
  docs: z.boolean(),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function flagValues(args: readonly string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value !== undefined && !value.startsWith('--')) values.push(value);
  }
  return values;
}

/** Settings from `MESH_*` environment variables and `--topic`, `--connect`, `--docs`. */
export function loadConfig(args: readonly string[] = process.argv.slice(2), env: Env = process.env): Config {
  const parsed = configSchema.safeParse({
    dataDir: env.MESH_DATA_DIR ?? path.join(os.homedir(), '.meshnode'),
    bindAddr: env.MESH_BIND ?? '0.0.0.0:0',
    logLevel: env.MESH_LOG_LEVEL ?? 'info',
    transport: env.MESH_TRANSPORT ?? 'websocket',
    topic: flagValues(args, '--topic')[0] ?? 'meshnode-chat',
    connect: flagValues(args, '--connect'),
    docs: args.includes('--docs'),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`invalid configuration: ${issues.join('; ')}`, 'INVALID_OPTIONS');
  }
  return parsed.data;
}

/** A 64-hex topic id is used as is; any other name is hashed into one. */
export function topicFromName(name: string): Topic {
  if (/^[0-9a-fA-F]{64}$/.test(name)) return Topic.parse(name);
  return Topic.fromBytes(sha256(new TextEncoder().encode(name)));
}

/** Parses `<peer id>@<address>`. */
export function parseNodeAddr(value: string): NodeAddr {
  const at = value.indexOf('@');
  if (at === -1) throw new ValidationError(`expected <peer id>@<address>, got "${value}"`, 'INVALID_PEER_ID');
  return { peerId: PeerId.parse(value.slice(0, at)), addresses: [value.slice(at + 1)] };
}

export function formatNodeAddr(addr: NodeAddr): string[] {
  return addr.addresses.map(a => `${addr.peerId.toString()}@${a}`);
}
