/**
 * Deletion gate.
 *
 * Deleting a note's file takes two steps:
 *   1. warning   - a fixed preamble plus a rotating reflective prompt;
 *                  the user accepts ("delete anyway") or cancels.
 *   2. composing - three lines whose word counts must fall inside the
 *                  configured bounds before confirm is enabled.
 */
import { GateStep, type DeletionGateView } from '@shared/session';
import type { GateLine } from '@shared/command';
import type { WordRange } from '@shared/settings';
import { sessionError, SessionErrorKind, type SessionError } from '@shared/errors';

export const DELETION_PREAMBLE = 'This machine was made for writing, not deleting.';
export const COMPOSE_HEADING = 'Write a haiku to delete!';

type HaikuLines = readonly [string, string, string];
type HaikuBounds = readonly [WordRange, WordRange, WordRange];

export type GateConfirmResult =
  | { readonly ok: true; readonly targetTabId: string }
  | { readonly ok: false; readonly error: SessionError };

/** Whitespace-separated, non-empty tokens */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function isValidComposition(lines: HaikuLines, bounds: HaikuBounds): boolean {
  return lines.every((line, i) => {
    const range = bounds[i];
    if (range === undefined) return false;
    const words = countWords(line);
    return words >= range.min && words <= range.max;
  });
}

/**
 * Round-robin over the prompt pool. Advances every time a prompt is taken.
 */
export class PromptRotation {
  private index = 0;
  private readonly prompts: readonly string[];

  constructor(prompts: readonly string[]) {
    this.prompts = prompts;
  }

  next(): { readonly index: number; readonly prompt: string } {
    const index = this.index;
    const prompt = this.prompts[index] ?? '';
    this.index = this.prompts.length === 0 ? 0 : (index + 1) % this.prompts.length;
    return { index, prompt };
  }
}

export class DeletionGate {
  readonly targetTabId: string;
  readonly promptIndex: number;
  readonly prompt: string;
  private currentStep: GateStep = GateStep.Warning;
  private currentLines: HaikuLines = ['', '', ''];
  private readonly bounds: HaikuBounds;

  constructor(targetTabId: string, rotation: PromptRotation, bounds: HaikuBounds) {
    const { index, prompt } = rotation.next();
    this.targetTabId = targetTabId;
    this.promptIndex = index;
    this.prompt = prompt;
    this.bounds = bounds;
  }

  get step(): GateStep {
    return this.currentStep;
  }

  get lines(): HaikuLines {
    return this.currentLines;
  }

  get canConfirm(): boolean {
    return (
      this.currentStep === GateStep.Composing && isValidComposition(this.currentLines, this.bounds)
    );
  }

  get message(): string {
    return this.currentStep === GateStep.Warning
      ? `${DELETION_PREAMBLE}\n\n${this.prompt}`
      : COMPOSE_HEADING;
  }

  /** Move from the warning to composing, starting with empty lines. */
  accept(): boolean {
    if (this.currentStep !== GateStep.Warning) return false;
    this.currentStep = GateStep.Composing;
    this.currentLines = ['', '', ''];
    return true;
  }

  /** Update one line and re-validate; returns whether confirm is enabled. */
  setLine(line: GateLine, value: string): boolean {
    if (this.currentStep !== GateStep.Composing) return false;
    const [l1, l2, l3] = this.currentLines;
    this.currentLines = line === 1 ? [value, l2, l3] : line === 2 ? [l1, value, l3] : [l1, l2, value];
    return this.canConfirm;
  }

  confirm(): GateConfirmResult {
    if (!this.canConfirm) {
      return {
        ok: false,
        error: sessionError(SessionErrorKind.ValidationBlocked, 'Haiku does not meet the word counts'),
      };
    }
    return { ok: true, targetTabId: this.targetTabId };
  }

  toView(): DeletionGateView {
    return {
      targetTabId: this.targetTabId,
      step: this.currentStep,
      message: this.message,
      lines: this.currentLines,
      canConfirm: this.canConfirm,
    };
  }
}
