/**
 * Core orchestration module.
 * Sessions and tasks → scheduler → session records → recording → replay,
 * plus coordinate selection and the click loop built on it.
 * No CLI, no browser library: sessions are reached through the handle contract.
 */

export { Task, toJsonValue } from './task.js';
export type { TaskInit, TaskCapture, TaskRunner } from './task.js';
export {
  navigateTask,
  clickTask,
  fillTask,
  scrollTask,
  waitTask,
  customTask,
} from './actions.js';
export type { TaskMeta, ElementOptions, CustomTaskInit } from './actions.js';
export { SessionRecord } from './sessionRecord.js';
export { executeChains, partitionChains, emptyReport } from './scheduler.js';
export type {
  Submission,
  SchedulerOptions,
  ExecutionReport,
  CompletedTask,
  FailedTask,
  SkippedTask,
} from './scheduler.js';
export {
  makeRunId,
  recordingFileName,
  buildRecording,
  saveRecording,
  loadRecording,
  resolveRecordingPath,
  listRecordings,
} from './recording.js';
export type { RecordingEntry, RecordingInput } from './recording.js';
export { reconstructTask, planReplay, replayRecording } from './replay.js';
export type {
  ReconstructOutcome,
  ReplayPlan,
  ReplayPlanEntry,
  ReplayOptions,
  ReplayResult,
  SkippedSnapshot,
} from './replay.js';
export { CoordinateBridge } from './bridge.js';
export type {
  ArmOptions,
  Point,
  SelectionCallback,
  SelectionOutcome,
  SelectionState,
} from './bridge.js';
export { ClickLoop, runClickLoop } from './clicker.js';
export type { ClickLoopOptions, ClickLoopStatus, ClickTarget } from './clicker.js';
export { Orchestrator, isBlankLocation } from './orchestrator.js';
export type {
  OrchestratorOptions,
  CreateSessionsOptions,
  RunReport,
  PickedPoint,
} from './orchestrator.js';
export * from './errors.js';
export { planScript, stepToTask, submitPlan } from './script.js';
export type { ScriptPlan } from './script.js';
