/**
 * nftables Provider
 * Drives the `nft` binary to install and remove per-session NAT rules
 *
 * Layout inside `<family> <table>`:
 * - PREROUTING (nat hook, dstnat): one dispatch rule per session,
 *   `th dport <ingress> jump <group>`
 * - <group> (regular chain, one per session): UDP and TCP dnat rules
 * - POSTROUTING (nat hook, srcnat): one masquerade rule per protocol per
 *   session so replies from the target come back through this host
 *
 * Hook-chain rules carry `comment "<group>"`; removal looks them up by that
 * tag in `nft -a list chain` output and deletes them by handle.
 */

import { execFile } from 'child_process';
import * as net from 'net';
import type { NftConfig } from '../config';
import { log } from '../lib/logger';
import { OperationQueue } from '../lib/op-queue';
import type { Protocol } from '../lib/state/types';
import type {
  GroupListResult,
  IpVersion,
  NatRuleProvider,
  ProviderFailure,
  ProviderResult,
} from './nat-provider';

export interface CommandOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary with arguments (no shell) and never rejects
 */
export type CommandRunner = (bin: string, args: string[], timeoutMs: number) => Promise<CommandOutcome>;

interface HookSpec {
  chain: string;
  hook: 'prerouting' | 'postrouting';
  priority: 'dstnat' | 'srcnat';
}

/**
 * Default runner: child_process.execFile with a kill-on-timeout bound
 */
export const execFileRunner: CommandRunner = (bin, args, timeoutMs) => {
  return new Promise((resolve) => {
    execFile(bin, args, { timeout: timeoutMs, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      if (error.killed) {
        resolve({ exitCode: null, stdout, stderr: `timed out after ${timeoutMs}ms` });
        return;
      }
      resolve({
        // Numeric code is the process exit status; string codes (ENOENT, EACCES) mean it never ran
        exitCode: typeof error.code === 'number' ? error.code : null,
        stdout,
        stderr: stderr.trim() || error.message,
      });
    });
  });
};

/**
 * Handles of rules in an `nft -a list chain` listing whose line matches
 */
export function findRuleHandles(listing: string, matches: (line: string) => boolean): number[] {
  const handles: number[] = [];
  for (const line of listing.split('\n')) {
    const handle = /#\s*handle\s+(\d+)\s*$/.exec(line);
    if (handle && matches(line)) {
      handles.push(parseInt(handle[1], 10));
    }
  }
  return handles;
}

/**
 * Chain names declared in an `nft list table` listing
 */
export function parseChainNames(listing: string): string[] {
  const names: string[] = [];
  const chainLine = /^\s*chain\s+(\S+)\s*\{/gm;
  let match: RegExpExecArray | null;
  while ((match = chainLine.exec(listing)) !== null) {
    names.push(match[1]);
  }
  return names;
}

function ipVersionOf(ip: string): IpVersion | null {
  const version = net.isIP(ip);
  return version === 4 || version === 6 ? version : null;
}

class NftablesProvider implements NatRuleProvider {
  // The runner's kill timer starts inside the queue slot, when nft is spawned
  readonly boundsOwnCalls = true;

  private readonly hooks: HookSpec[];

  constructor(
    private readonly config: NftConfig,
    private readonly runner: CommandRunner = execFileRunner,
    private readonly queue: OperationQueue = new OperationQueue('nft'),
  ) {
    this.hooks = [
      { chain: config.preroutingChain, hook: 'prerouting', priority: 'dstnat' },
      { chain: config.postroutingChain, hook: 'postrouting', priority: 'srcnat' },
    ];
  }

  /**
   * Run one nft command through the shared queue
   */
  private async nft(args: string[]): Promise<ProviderResult> {
    const command = [this.config.bin, ...args].join(' ');
    const outcome = await this.queue.run('nft', () => this.runner(this.config.bin, args, this.config.timeoutMs));
    if (outcome.exitCode === 0) {
      log.nft(command);
      return { ok: true, command, stdout: outcome.stdout };
    }
    log.nft(`Failed: ${command}`, { exitCode: outcome.exitCode, stderr: outcome.stderr });
    return { ok: false, command, exitCode: outcome.exitCode, stderr: outcome.stderr };
  }

  private get tableArgs(): [string, string] {
    return [this.config.family, this.config.table];
  }

  /**
   * Delete every rule in `chain` whose listing line matches.
   * Nothing matching means the rule is already gone, which counts as success.
   */
  private async deleteMatchingRules(chain: string, matches: (line: string) => boolean): Promise<ProviderResult> {
    const listing = await this.nft(['-a', 'list', 'chain', ...this.tableArgs, chain]);
    if (!listing.ok) {
      return listing;
    }

    const handles = findRuleHandles(listing.stdout, matches);
    if (handles.length === 0) {
      log.debugFor('nft', 'No matching rule to delete', { chain });
      return { ok: true, command: listing.command, stdout: '' };
    }

    let last: ProviderResult = listing;
    for (const handle of handles) {
      last = await this.nft(['delete', 'rule', ...this.tableArgs, chain, 'handle', String(handle)]);
      if (!last.ok) {
        return last;
      }
    }
    return last;
  }

  private dnatArgs(targetIp: string, targetPort: number): string[] {
    const address = ipVersionOf(targetIp) === 6 ? `[${targetIp}]:${targetPort}` : `${targetIp}:${targetPort}`;
    if (this.config.family === 'inet') {
      return ['dnat', ipVersionOf(targetIp) === 6 ? 'ip6' : 'ip', 'to', address];
    }
    return ['dnat', 'to', address];
  }

  async ensureBaseHooks(): Promise<ProviderResult> {
    const created: string[] = [];

    const table = await this.nft(['list', 'table', ...this.tableArgs]);
    if (!table.ok) {
      const added = await this.nft(['add', 'table', ...this.tableArgs]);
      if (!added.ok) {
        return added;
      }
      created.push(`table ${this.tableArgs.join(' ')}`);
    }

    for (const { chain, hook, priority } of this.hooks) {
      const existing = await this.nft(['list', 'chain', ...this.tableArgs, chain]);
      if (existing.ok) {
        continue;
      }
      const added = await this.nft([
        'add', 'chain', ...this.tableArgs, chain,
        '{', 'type', 'nat', 'hook', hook, 'priority', priority, ';', '}',
      ]);
      if (!added.ok) {
        return added;
      }
      created.push(`chain ${chain}`);
    }

    if (created.length > 0) {
      log.info('Created base NAT hooks', { created });
    }
    return {
      ok: true,
      command: 'ensure-base-hooks',
      stdout: created.length > 0 ? `created: ${created.join(', ')}` : 'already present',
    };
  }

  createGroup(name: string): Promise<ProviderResult> {
    return this.nft(['add', 'chain', ...this.tableArgs, name]);
  }

  flushGroup(name: string): Promise<ProviderResult> {
    return this.nft(['flush', 'chain', ...this.tableArgs, name]);
  }

  deleteGroup(name: string): Promise<ProviderResult> {
    return this.nft(['delete', 'chain', ...this.tableArgs, name]);
  }

  addRedirectRule(
    group: string,
    protocol: Protocol,
    ingressPort: number,
    targetIp: string,
    targetPort: number,
  ): Promise<ProviderResult> {
    return this.nft([
      'add', 'rule', ...this.tableArgs, group,
      protocol, 'dport', String(ingressPort),
      ...this.dnatArgs(targetIp, targetPort),
    ]);
  }

  addDispatchRule(ingressPort: number, group: string): Promise<ProviderResult> {
    return this.nft([
      'add', 'rule', ...this.tableArgs, this.config.preroutingChain,
      'meta', 'l4proto', '{', 'tcp,', 'udp', '}', 'th', 'dport', String(ingressPort),
      'jump', group, 'comment', `"${group}"`,
    ]);
  }

  removeDispatchRule(ingressPort: number, group: string): Promise<ProviderResult> {
    return this.deleteMatchingRules(this.config.preroutingChain, line =>
      line.includes(`jump ${group}`) && line.includes(`dport ${ingressPort} `),
    );
  }

  addReturnMasqueradeRule(group: string, protocol: Protocol, targetIp: string, targetPort: number): Promise<ProviderResult> {
    return this.nft([
      'add', 'rule', ...this.tableArgs, this.config.postroutingChain,
      ipVersionOf(targetIp) === 6 ? 'ip6' : 'ip', 'daddr', targetIp,
      protocol, 'dport', String(targetPort),
      'masquerade', 'comment', `"${group}"`,
    ]);
  }

  removeReturnMasqueradeRule(group: string, protocol: Protocol, _targetIp: string, targetPort: number): Promise<ProviderResult> {
    return this.deleteMatchingRules(this.config.postroutingChain, line =>
      line.includes(`comment "${group}"`) && line.includes(`${protocol} dport ${targetPort} `),
    );
  }

  listTables(): Promise<ProviderResult> {
    return this.nft(['list', 'tables']);
  }

  async listGroups(prefix: string): Promise<GroupListResult> {
    const listing = await this.nft(['list', 'table', ...this.tableArgs]);
    if (!listing.ok) {
      return listing;
    }
    const groups = parseChainNames(listing.stdout).filter(name => name.startsWith(prefix));
    return { ...listing, groups };
  }

  async removeTaggedRules(group: string): Promise<ProviderResult> {
    let firstFailure: ProviderFailure | null = null;
    for (const { chain } of this.hooks) {
      const result = await this.deleteMatchingRules(chain, line => line.includes(`comment "${group}"`));
      if (!result.ok && !firstFailure) {
        firstFailure = result;
      }
    }
    return firstFailure ?? { ok: true, command: `remove-tagged-rules ${group}`, stdout: '' };
  }

  supportsIpVersion(version: IpVersion): boolean {
    switch (this.config.family) {
      case 'ip': return version === 4;
      case 'ip6': return version === 6;
      case 'inet': return true;
    }
  }
}

export default NftablesProvider;
export { NftablesProvider };
