/**
 * 热键组合匹配
 *
 * 配置若干组按键，任意一组的所有键同时按住即为按下；
 * 激活后任意一组都不再满足时为松开。系统自动重复的按下事件不会重复触发。
 */

import type { KeyEvent } from '../types/trigger';

export type ChordTransition = 'press' | 'release';

export class ChordMatcher {
  private readonly combos: ReadonlyArray<ReadonlySet<string>>;
  private readonly held = new Set<string>();
  private active = false;

  constructor(combos: string[][]) {
    this.combos = combos
      .filter((combo) => combo.length > 0)
      .map((combo) => new Set(combo.map(normalizeKey)));
  }

  /**
   * 输入一个按键事件，返回组合状态的变化
   */
  feed(event: KeyEvent): ChordTransition | null {
    const key = normalizeKey(event.key);

    if (event.state === 'down') {
      if (this.held.has(key)) {
        // 自动重复
        return null;
      }
      this.held.add(key);

      if (!this.active && this.anyComboHeld()) {
        this.active = true;
        return 'press';
      }
      return null;
    }

    this.held.delete(key);
    if (this.active && !this.anyComboHeld()) {
      this.active = false;
      return 'release';
    }
    return null;
  }

  /**
   * 清空按键状态（监听重启时使用）
   */
  reset(): void {
    this.held.clear();
    this.active = false;
  }

  isActive(): boolean {
    return this.active;
  }

  describe(): string {
    return this.combos.map((combo) => Array.from(combo).join('+')).join(' | ');
  }

  private anyComboHeld(): boolean {
    return this.combos.some((combo) => {
      for (const key of combo) {
        if (!this.held.has(key)) {
          return false;
        }
      }
      return true;
    });
  }
}

/**
 * 键名规范化：大写、合并空白
 */
export function normalizeKey(key: string): string {
  return key.trim().replace(/\s+/g, ' ').toUpperCase();
}
