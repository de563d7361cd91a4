import { z } from 'zod';
import { AllowedProducts, ChangeoverMatrix, ProductionLine } from '../domain/types';
import { logger } from '../utils/logger';

export const DEFAULT_CHANGEOVER_MINUTES = 30;

export const UNRESTRICTED: AllowedProducts = { kind: 'unrestricted' };

const rawAllowedProductsSchema = z.union([
  z.array(z.string()),
  z.object({ skus: z.array(z.string()) }).passthrough(),
]);

const rawChangeoverMatrixSchema = z.record(z.coerce.number().nonnegative());

/**
 * Stored lines carry the allow-list either as a bare SKU array or as `{ skus: [...] }`;
 * `null` and any other shape mean the line takes every product.
 */
export function parseAllowedProducts(raw: unknown): AllowedProducts {
  if (raw === null || raw === undefined) return UNRESTRICTED;
  const parsed = rawAllowedProductsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.debug('Unrecognised allowed_products shape, treating line as unrestricted', { raw });
    return UNRESTRICTED;
  }
  const skus = Array.isArray(parsed.data) ? parsed.data : parsed.data.skus;
  return { kind: 'explicit', skus: [...skus] };
}

export function parseChangeoverMatrix(raw: unknown): ChangeoverMatrix | null {
  if (raw === null || raw === undefined) return null;
  const parsed = rawChangeoverMatrixSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Ignoring malformed changeover matrix', { issues: parsed.error.issues.map(i => i.message) });
    return null;
  }
  return parsed.data;
}

export function isProductAllowed(sku: string, line: Pick<ProductionLine, 'allowedProducts'>): boolean {
  switch (line.allowedProducts.kind) {
    case 'unrestricted':
      return true;
    case 'explicit':
      return line.allowedProducts.skus.includes(sku);
  }
}

/**
 * Minutes needed to switch `line` from `fromSku` to `toSku`. Lookup order is the
 * directed pair, the reverse pair, the matrix default, then 30 minutes.
 */
export function changeoverMinutes(
  fromSku: string | null,
  toSku: string,
  line: Pick<ProductionLine, 'changeoverMatrix'>
): number {
  if (fromSku === null || fromSku === toSku) return 0;

  const matrix = line.changeoverMatrix;
  if (matrix) {
    const forward = matrix[`${fromSku}->${toSku}`];
    if (forward !== undefined) return forward;
    const reverse = matrix[`${toSku}->${fromSku}`];
    if (reverse !== undefined) return reverse;
    if (matrix.default !== undefined) return matrix.default;
  }
  return DEFAULT_CHANGEOVER_MINUTES;
}
