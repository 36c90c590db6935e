import type { Dialect, TranspileResult, TranspileWarning } from '@/lib/exports/expressions/types';

/** Per-call transpile state; never reused across serialize calls. */
export interface TranspileContext {
  dialect: Dialect;
  warnings: TranspileWarning[];
}

export function createTranspileContext(dialect: Dialect): TranspileContext {
  return { dialect, warnings: [] };
}

/** Records warnings and returns the expression, or null for failed or empty results. */
export function takeExpr(ctx: TranspileContext, result: TranspileResult): string | null {
  if (!result.ok) {
    console.warn('[EXPORT][transpile]', { dialect: ctx.dialect, code: result.error.code, message: result.error.message });
    return null;
  }
  ctx.warnings.push(...result.warnings);
  return result.expr === '' ? null : result.expr;
}
