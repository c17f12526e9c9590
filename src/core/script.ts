import type { RunScript, ScriptStep } from '../schema/index.js';
import { RECORDING } from '../config/defaults.js';
import { clickTask, fillTask, navigateTask, scrollTask, waitTask } from './actions.js';
import type { Orchestrator } from './orchestrator.js';
import type { Submission } from './scheduler.js';
import type { Task } from './task.js';

// ── Planning ─────────────────────────────────────────────────

export interface ScriptPlan {
  /** One starting location per scripted session, by position. */
  locations: string[];
  submissions: Submission[];
}

export function stepToTask(step: ScriptStep): Task {
  const meta = { name: step.name, description: step.description };
  switch (step.action) {
    case 'navigate':
      return navigateTask(step.url, meta);
    case 'click':
      return clickTask(step.selector, { ...meta, by: step.by, timeout: step.timeout });
    case 'fill':
      return fillTask(step.selector, step.text, { ...meta, by: step.by, timeout: step.timeout });
    case 'scroll':
      return scrollTask(step.amount, meta);
    case 'wait':
      return waitTask(step.seconds, meta);
  }
}

/** Turn a validated script into tasks addressed by session position. */
export function planScript(script: RunScript): ScriptPlan {
  const plan: ScriptPlan = { locations: [], submissions: [] };
  script.sessions.forEach((session, position) => {
    plan.locations.push(session.url ?? RECORDING.BLANK_LOCATION);
    for (const step of session.steps) {
      plan.submissions.push({ task: stepToTask(step), sessionIndex: position });
    }
  });
  return plan;
}

/**
 * Queue a plan on `orchestrator`, whose sessions were created from
 * `plan.locations`. Tasks for sessions that failed to start are
 * dropped; the count of queued tasks is returned.
 */
export function submitPlan(plan: ScriptPlan, orchestrator: Orchestrator): number {
  let queued = 0;
  for (const { task, sessionIndex } of plan.submissions) {
    if (!orchestrator.hasSession(sessionIndex)) continue;
    orchestrator.addTask(task, sessionIndex);
    queued++;
  }
  return queued;
}
