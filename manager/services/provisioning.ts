/**
 * Provisioning protocol
 *
 * The rule set for one session is installed as an ordered list of steps.
 * Install stops at the first failed step and replays the undo actions of the
 * steps before it, newest first. A step whose outcome is unknown (timed out
 * or rejected) is undone as well, after its call settles. Teardown replays every undo action, newest
 * first, and keeps going past failures.
 */

import { errorMessage } from '../lib/errors';
import { log } from '../lib/logger';
import type { TargetEndpoint } from '../lib/state/types';
import type { NatRuleProvider, ProviderFailure, ProviderResult, ProviderSuccess } from './nat-provider';

export type StepName =
  | 'create-group'
  | 'redirect-udp'
  | 'redirect-tcp'
  | 'dispatch'
  | 'return-udp'
  | 'return-tcp';

export type StepPhase = 'install' | 'undo';

export interface ProvisioningContext {
  ruleGroupId: string;
  ingressPort: number;
  target: TargetEndpoint;
}

type StepAction = (provider: NatRuleProvider, ctx: ProvisioningContext) => Promise<ProviderResult>;

export interface ProvisioningStep {
  name: StepName;
  install: StepAction;
  // Steps without an undo are removed together with their group
  undo?: StepAction;
}

export interface StepFailure {
  step: StepName;
  phase: StepPhase;
  command: string;
  exitCode: number | null;
  stderr: string;
}

export type InstallOutcome =
  | { ok: true }
  | { ok: false; failure: StepFailure; rollbackFailures: StepFailure[] };

export const PROVISIONING_STEPS: readonly ProvisioningStep[] = [
  {
    name: 'create-group',
    install: (p, ctx) => p.createGroup(ctx.ruleGroupId),
    undo: async (p, ctx) => {
      const flushed = await p.flushGroup(ctx.ruleGroupId);
      const deleted = await p.deleteGroup(ctx.ruleGroupId);
      return flushed.ok ? deleted : flushed;
    },
  },
  {
    name: 'redirect-udp',
    install: (p, ctx) => p.addRedirectRule(ctx.ruleGroupId, 'udp', ctx.ingressPort, ctx.target.ip, ctx.target.port),
  },
  {
    name: 'redirect-tcp',
    install: (p, ctx) => p.addRedirectRule(ctx.ruleGroupId, 'tcp', ctx.ingressPort, ctx.target.ip, ctx.target.port),
  },
  {
    name: 'dispatch',
    install: (p, ctx) => p.addDispatchRule(ctx.ingressPort, ctx.ruleGroupId),
    undo: (p, ctx) => p.removeDispatchRule(ctx.ingressPort, ctx.ruleGroupId),
  },
  {
    name: 'return-udp',
    install: (p, ctx) => p.addReturnMasqueradeRule(ctx.ruleGroupId, 'udp', ctx.target.ip, ctx.target.port),
    undo: (p, ctx) => p.removeReturnMasqueradeRule(ctx.ruleGroupId, 'udp', ctx.target.ip, ctx.target.port),
  },
  {
    name: 'return-tcp',
    install: (p, ctx) => p.addReturnMasqueradeRule(ctx.ruleGroupId, 'tcp', ctx.target.ip, ctx.target.port),
    undo: (p, ctx) => p.removeReturnMasqueradeRule(ctx.ruleGroupId, 'tcp', ctx.target.ip, ctx.target.port),
  },
];

interface BoundedCall<R extends ProviderSuccess> {
  // First of the call's own result and the timeout
  result: Promise<R | ProviderFailure>;
  // The call's own result, however late
  settled: Promise<R | ProviderFailure>;
}

function boundProviderCall<R extends ProviderSuccess>(
  label: string,
  timeoutMs: number | null,
  call: () => Promise<R | ProviderFailure>,
): BoundedCall<R> {
  // Providers resolve with failures; a rejection is a provider bug, reported as a failed call
  const settled = call().catch((err: unknown): ProviderFailure => ({
    ok: false,
    command: label,
    exitCode: null,
    stderr: errorMessage(err),
  }));
  if (timeoutMs === null) {
    return { result: settled, settled };
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<ProviderFailure>((resolve) => {
    timer = setTimeout(() => {
      resolve({ ok: false, command: label, exitCode: null, stderr: `timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });
  return { result: Promise.race([settled, timeout]).finally(() => clearTimeout(timer)), settled };
}

/**
 * Bound a provider call. A call still running after `timeoutMs` resolves as a
 * failure labelled with `label`; the call itself is left to finish on its own.
 * A null bound means the provider bounds its own calls.
 */
export function withProviderTimeout<R extends ProviderSuccess>(
  label: string,
  timeoutMs: number | null,
  call: () => Promise<R | ProviderFailure>,
): Promise<R | ProviderFailure> {
  return boundProviderCall(label, timeoutMs, call).result;
}

interface StepAttempt {
  failure: StepFailure | null;
  settled: Promise<ProviderResult>;
}

export class Provisioner {
  private readonly timeoutMs: number | null;

  constructor(
    private readonly provider: NatRuleProvider,
    timeoutMs: number,
    private readonly steps: readonly ProvisioningStep[] = PROVISIONING_STEPS,
  ) {
    this.timeoutMs = provider.boundsOwnCalls ? null : timeoutMs;
  }

  /**
   * Install every step in order, rolling back on the first failure
   */
  async install(ctx: ProvisioningContext): Promise<InstallOutcome> {
    for (let i = 0; i < this.steps.length; i++) {
      const step = this.steps[i];
      const { failure, settled } = await this.attemptStep(step, 'install', step.install, ctx);
      if (failure) {
        log.provisioning('Install step failed; rolling back', {
          group: ctx.ruleGroupId,
          step: step.name,
          command: failure.command,
          exitCode: failure.exitCode,
          stderr: failure.stderr,
        });
        if (failure.exitCode === null) {
          await this.undoUncertainStep(step, settled, ctx);
        }
        const rollbackFailures = await this.undoSteps(this.steps.slice(0, i), ctx);
        return { ok: false, failure, rollbackFailures };
      }
    }
    log.provisioning('Installed', { group: ctx.ruleGroupId, ingressPort: ctx.ingressPort });
    return { ok: true };
  }

  /**
   * Undo every step, newest first. Failures are collected, never thrown.
   */
  async teardown(ctx: ProvisioningContext): Promise<StepFailure[]> {
    const failures = await this.undoSteps(this.steps, ctx);
    if (failures.length === 0) {
      log.provisioning('Torn down', { group: ctx.ruleGroupId });
    }
    return failures;
  }

  /**
   * A step that timed out or rejected may still take effect. Wait (bounded)
   * for the call to settle, then run its own undo. Failures here are only
   * logged: the step may never have applied.
   */
  private async undoUncertainStep(
    step: ProvisioningStep,
    settled: Promise<ProviderResult>,
    ctx: ProvisioningContext,
  ): Promise<void> {
    const late = await withProviderTimeout(`${step.name} (install)`, this.timeoutMs, () => settled);
    log.provisioning(`Undoing ${step.name} after an unknown outcome`, {
      group: ctx.ruleGroupId,
      lateResult: late.ok ? 'applied' : late.stderr,
    });
    if (!step.undo) return;
    const failure = await this.runStep(step, 'undo', step.undo, ctx);
    if (failure) {
      log.warn(`Undo of uncertain ${step.name} failed`, {
        group: ctx.ruleGroupId,
        command: failure.command,
        exitCode: failure.exitCode,
        stderr: failure.stderr,
      });
    }
  }

  private async undoSteps(steps: readonly ProvisioningStep[], ctx: ProvisioningContext): Promise<StepFailure[]> {
    const failures: StepFailure[] = [];
    for (const step of [...steps].reverse()) {
      if (!step.undo) continue;
      const failure = await this.runStep(step, 'undo', step.undo, ctx);
      if (failure) {
        log.warn(`Undo of ${step.name} failed`, {
          group: ctx.ruleGroupId,
          command: failure.command,
          exitCode: failure.exitCode,
          stderr: failure.stderr,
        });
        failures.push(failure);
      }
    }
    return failures;
  }

  /**
   * Run one step action under the provider timeout
   * @returns The failure, or null on success
   */
  private async runStep(
    step: ProvisioningStep,
    phase: StepPhase,
    action: StepAction,
    ctx: ProvisioningContext,
  ): Promise<StepFailure | null> {
    return (await this.attemptStep(step, phase, action, ctx)).failure;
  }

  private async attemptStep(
    step: ProvisioningStep,
    phase: StepPhase,
    action: StepAction,
    ctx: ProvisioningContext,
  ): Promise<StepAttempt> {
    const call = boundProviderCall(`${step.name} (${phase})`, this.timeoutMs, () => action(this.provider, ctx));
    const result = await call.result;
    if (result.ok) {
      return { failure: null, settled: call.settled };
    }
    return {
      failure: {
        step: step.name,
        phase,
        command: result.command,
        exitCode: result.exitCode,
        stderr: result.stderr,
      },
      settled: call.settled,
    };
  }
}
