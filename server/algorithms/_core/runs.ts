/**
 * 越限区段状态机
 *
 * 暂降、暂升、CT 饱和共用的 run-length 原语：
 * 两个状态 outside_run / inside_run，由逐点布尔谓词驱动转换。
 *
 *   outside_run --predicate=true--> inside_run   (打开区段，记录起点)
 *   inside_run  --predicate=true--> inside_run   (延续，更新极值)
 *   inside_run  --predicate=false-> outside_run  (关闭区段，终点为上一点)
 *   序列结束时仍在 inside_run：在最后一点关闭
 */

export type RunState = 'outside_run' | 'inside_run';

export type ExtremeDirection = 'min' | 'max';

export interface Run {
  /** 区段第一个满足谓词的下标 */
  startIndex: number;
  /** 区段最后一个满足谓词的下标（含） */
  endIndex: number;
  /** 区段内的极值（按 direction 取最小或最大） */
  extreme: number;
  extremeIndex: number;
}

export interface RunScanOptions<T> {
  predicate: (value: T, index: number) => boolean;
  /** 从元素中取用于极值跟踪的量 */
  magnitude: (value: T, index: number) => number;
  direction: ExtremeDirection;
}

export function collectRuns<T>(values: readonly T[], options: RunScanOptions<T>): Run[] {
  const { predicate, magnitude, direction } = options;
  const runs: Run[] = [];
  let state: RunState = 'outside_run';
  let current: Run | null = null;

  for (let i = 0; i < values.length; i++) {
    const hit = predicate(values[i], i);

    if (state === 'outside_run') {
      if (!hit) continue;
      const m = magnitude(values[i], i);
      current = { startIndex: i, endIndex: i, extreme: m, extremeIndex: i };
      state = 'inside_run';
    } else if (current) {
      if (hit) {
        current.endIndex = i;
        const m = magnitude(values[i], i);
        if (direction === 'min' ? m < current.extreme : m > current.extreme) {
          current.extreme = m;
          current.extremeIndex = i;
        }
      } else {
        runs.push(current);
        current = null;
        state = 'outside_run';
      }
    }
  }

  if (current) runs.push(current);
  return runs;
}

/** 只关心区段边界时的简化版本 */
export function findRuns(values: readonly boolean[]): Array<{ startIndex: number; endIndex: number }> {
  return collectRuns(values, {
    predicate: v => v,
    magnitude: () => 0,
    direction: 'max',
  }).map(({ startIndex, endIndex }) => ({ startIndex, endIndex }));
}
