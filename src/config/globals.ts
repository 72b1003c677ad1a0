import { ConfigError } from '../errors/index';
import { convertSectionConfig } from '../fields/convert';
import type { RawSettings } from '../types/raw';
import { GLOBAL_SECTION, PRODUCT_NAMES } from './constants';
import { GLOBAL_FIELDS, type GlobalSettings } from './sections';

export function normalizeProductName(productName: string): string {
  const lower = productName.toLowerCase();
  if (!PRODUCT_NAMES.some((name) => name === lower)) {
    throw new ConfigError(
      `product-name ${productName} is illegal; either ${PRODUCT_NAMES.join(' or ')} are allowed`,
      'domain'
    );
  }
  return lower;
}

export function configureGlobals(settings: RawSettings): GlobalSettings {
  const productName = settings['product-name'];
  const normalized =
    typeof productName === 'string'
      ? { ...settings, 'product-name': normalizeProductName(productName) }
      : settings;
  return convertSectionConfig(GLOBAL_FIELDS, normalized, GLOBAL_SECTION);
}
