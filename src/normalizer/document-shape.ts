// Lightweight shape checks for CycloneDX CBOM documents (non-exhaustive).
// Findings are reported as warnings on the asset set; they never block
// normalization because tools routinely emit partial documents.

import { getArray, getObject, getString, isJsonObject } from '../json-document';
import { JsonValue } from '../types';

export interface ShapeResult {
  valid: boolean;
  errors: string[];
}

const CRYPTO_ASSET_TYPES = ['algorithm', 'certificate', 'protocol', 'related-crypto-material'];

export function inspectCycloneDxShape(doc: JsonValue, label = 'bom'): ShapeResult {
  const errors: string[] = [];
  if (!isJsonObject(doc)) return { valid: false, errors: [`${label}: document not an object`] };
  if (getString(doc, 'bomFormat') !== 'CycloneDX') errors.push(`${label}: bomFormat must be CycloneDX`);
  const specVersion = getString(doc, 'specVersion');
  if (!specVersion) errors.push(`${label}: specVersion missing`);
  else if (!/^1\.[6-9]/.test(specVersion)) errors.push(`${label}: specVersion ${specVersion} predates cryptoProperties`);
  if (doc.components === undefined) {
    errors.push(`${label}: components missing`);
  } else {
    const components = getArray(doc, 'components');
    if (!components) errors.push(`${label}: components must be array`);
    else {
      components.forEach((c, i) => {
        if (!isJsonObject(c)) {
          errors.push(`${label}.components[${i}] not an object`);
          return;
        }
        if (!getString(c, 'name')) errors.push(`${label}.components[${i}].name missing`);
        const crypto = getObject(c, 'cryptoProperties');
        if (getString(c, 'type') === 'cryptographic-asset' && !crypto) {
          errors.push(`${label}.components[${i}].cryptoProperties missing`);
        }
        const assetType = crypto ? getString(crypto, 'assetType') : undefined;
        if (assetType && !CRYPTO_ASSET_TYPES.includes(assetType)) {
          errors.push(`${label}.components[${i}].cryptoProperties.assetType invalid`);
        }
      });
    }
  }
  return { valid: errors.length === 0, errors };
}
