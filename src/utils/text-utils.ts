/**
 * 文本处理工具函数
 */

/**
 * 统计字符数（按 Unicode 码点）
 */
export function countCharacters(text: string): number {
  return Array.from(text).length;
}

/**
 * 统计文本中的单词数
 */
export function countWords(text: string): number {
  // 中文按字数统计，英文按空格分隔
  const chineseChars = (text.match(/[\u4e00-\u9fa5]/g) || []).length;
  const englishWords = text
    .replace(/[\u4e00-\u9fa5]/g, ' ')
    .trim()
    .split(/\s+/)
    .filter((w) => w.length > 0).length;

  return chineseChars + englishWords;
}

/**
 * 清理文本中的换行与多余空白
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/[\r\n]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * 截断文本，超长时以 "..." 结尾，总长不超过 maxLength
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, Math.max(0, maxLength - 3)) + '...';
}

/**
 * 秒数格式化：12.3s / 2m 5s / 1h 4m
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}m ${Math.round(seconds % 60)}s`;
  }

  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/**
 * 按句末标点拆句
 */
export function splitSentences(text: string): string[] {
  return text
    .trim()
    .split(/(?<=[.!?。！？])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * 转义正则表达式特殊字符
 */
export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 按原文的大小写风格输出替换词
 */
export function preserveCase(original: string, target: string): string {
  if (original.length > 1 && original === original.toUpperCase() && original !== original.toLowerCase()) {
    return target.toUpperCase();
  }

  const first = original.charAt(0);
  if (first !== first.toLowerCase() && target.charAt(0) === target.charAt(0).toLowerCase()) {
    return target.charAt(0).toUpperCase() + target.slice(1);
  }

  return target;
}

/**
 * 数字千分位
 */
export function formatThousands(value: number): string {
  return value.toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}
