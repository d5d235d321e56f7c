import type { Stage, TurnRecord } from '../types/index.js';
import type { StallConfig } from './config.js';
import type { FieldUpdate } from './lead-profile.js';
import { updatedKeys } from './lead-profile.js';
import { diceCoefficient } from './text-similarity.js';

export interface StuckDetectorSnapshot {
  stage: Stage;
  consecutiveNoProgressCount: number;
  similarityWindow: string[];
}

/**
 * Declares a stage stalled when user turns stop producing new fields.
 *
 * Stalled when the last `noProgressTurns` user turns added nothing AND the last
 * two are near-duplicates, or when `stageTurnCeiling` user turns passed without
 * progress. Counters reset on any new field or a stage change.
 */
export class StuckDetector {
  private stage: Stage;
  private consecutiveNoProgressCount = 0;
  private similarityWindow: string[] = [];

  constructor(private config: StallConfig, stage: Stage = 'introduction') {
    this.stage = stage;
  }

  observe(turn: TurnRecord, stage: Stage, extractionUpdate: FieldUpdate): boolean {
    if (stage !== this.stage) {
      this.reset(stage);
    }

    if (turn.role !== 'user') {
      return this.isStalled();
    }

    if (updatedKeys(extractionUpdate).length > 0) {
      this.reset(stage);
      return false;
    }

    this.consecutiveNoProgressCount++;
    this.similarityWindow = [...this.similarityWindow, turn.text].slice(-2);

    const stalled = this.isStalled();
    if (stalled) {
      console.log(`🔁 Stage ${stage} looks stalled after ${this.consecutiveNoProgressCount} turn(s) without progress`);
    }
    return stalled;
  }

  isStalled(): boolean {
    if (this.consecutiveNoProgressCount >= this.config.stageTurnCeiling) {
      return true;
    }
    if (this.consecutiveNoProgressCount < this.config.noProgressTurns || this.similarityWindow.length < 2) {
      return false;
    }
    const [previous, latest] = this.similarityWindow;
    return diceCoefficient(previous, latest) >= this.config.similarityThreshold;
  }

  /**
   * Called when the orchestrator changes stage outside of observe()
   */
  reset(stage: Stage): void {
    this.stage = stage;
    this.consecutiveNoProgressCount = 0;
    this.similarityWindow = [];
  }

  toSnapshot(): StuckDetectorSnapshot {
    return {
      stage: this.stage,
      consecutiveNoProgressCount: this.consecutiveNoProgressCount,
      similarityWindow: [...this.similarityWindow],
    };
  }

  static fromSnapshot(config: StallConfig, snapshot: StuckDetectorSnapshot): StuckDetector {
    const detector = new StuckDetector(config, snapshot.stage);
    detector.consecutiveNoProgressCount = snapshot.consecutiveNoProgressCount;
    detector.similarityWindow = [...snapshot.similarityWindow];
    return detector;
  }
}
