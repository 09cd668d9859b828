/**
 * Memory Model - the swappable retention-curve strategy
 *
 * The scheduler owns phase transitions, step timing and interval bounds; the
 * memory model only answers numeric questions about stability, difficulty
 * and retrievability. Any implementation can be plugged in, the scheduler
 * enforces the monotonicity rules on whatever it returns.
 *
 * The default model delegates to ts-fsrs (DSR model: Difficulty, Stability,
 * Retrievability) with fuzz disabled so every result is reproducible.
 */

import {
  FSRSAlgorithm,
  generatorParameters,
  Rating,
  type Grade as FsrsGrade,
} from 'ts-fsrs';
import { Grade } from './types';

export interface MemoryModel {
  initialStability(grade: Grade): number;
  initialDifficulty(grade: Grade): number;
  /** Probability of recall after `elapsedDays` for a memory of `stability`. */
  retrievability(elapsedDays: number, stability: number): number;
  nextDifficulty(difficulty: number, grade: Grade): number;
  /** Stability after a successful recall (HARD, GOOD or EASY). */
  nextRecallStability(difficulty: number, stability: number, retrievability: number, grade: Grade): number;
  /** Stability after a lapse. */
  nextForgetStability(difficulty: number, stability: number, retrievability: number): number;
  /** Stability change for same-day reviews in the learning phases. */
  nextShortTermStability(stability: number, grade: Grade): number;
  /** Days until recall probability falls to the desired retention. */
  intervalDays(stability: number): number;
}

export interface MemoryModelOptions {
  desired_retention: number;
  maximum_interval: number;
  weights?: readonly number[];
}

const FSRS_GRADES: Record<Grade, FsrsGrade> = {
  [Grade.AGAIN]: Rating.Again,
  [Grade.HARD]: Rating.Hard,
  [Grade.GOOD]: Rating.Good,
  [Grade.EASY]: Rating.Easy,
};

function toFsrsGrade(grade: Grade): FsrsGrade {
  return FSRS_GRADES[grade];
}

/**
 * MemoryModel backed by the ts-fsrs algorithm.
 */
export class FsrsMemoryModel implements MemoryModel {
  private readonly algorithm: FSRSAlgorithm;

  constructor(options: MemoryModelOptions) {
    this.algorithm = new FSRSAlgorithm(generatorParameters({
      request_retention: options.desired_retention,
      maximum_interval: options.maximum_interval,
      enable_fuzz: false,
      enable_short_term: true,
      ...(options.weights ? { w: [...options.weights] } : {}),
    }));
  }

  initialStability(grade: Grade): number {
    return this.algorithm.init_stability(toFsrsGrade(grade));
  }

  initialDifficulty(grade: Grade): number {
    return this.algorithm.init_difficulty(toFsrsGrade(grade));
  }

  retrievability(elapsedDays: number, stability: number): number {
    return this.algorithm.forgetting_curve(elapsedDays, stability);
  }

  nextDifficulty(difficulty: number, grade: Grade): number {
    return this.algorithm.next_difficulty(difficulty, toFsrsGrade(grade));
  }

  nextRecallStability(difficulty: number, stability: number, retrievability: number, grade: Grade): number {
    return this.algorithm.next_recall_stability(difficulty, stability, retrievability, toFsrsGrade(grade));
  }

  nextForgetStability(difficulty: number, stability: number, retrievability: number): number {
    return this.algorithm.next_forget_stability(difficulty, stability, retrievability);
  }

  nextShortTermStability(stability: number, grade: Grade): number {
    return this.algorithm.next_short_term_stability(stability, toFsrsGrade(grade));
  }

  intervalDays(stability: number): number {
    return this.algorithm.next_interval(stability, 0);
  }
}

export function createMemoryModel(options: MemoryModelOptions): MemoryModel {
  return new FsrsMemoryModel(options);
}
