import { inspectCycloneDxShape } from '../src/normalizer/document-shape';
import { cryptoComponent, cycloneDx } from './fixtures';

describe('CycloneDX shape inspection', () => {
  it('accepts a CBOM with crypto properties', () => {
    const res = inspectCycloneDxShape(cycloneDx([cryptoComponent('AES'), { type: 'library', name: 'bcprov' }]));
    expect(res).toEqual({ valid: true, errors: [] });
  });

  it('reports format, version and component problems', () => {
    const res = inspectCycloneDxShape({
      bomFormat: 'SPDX',
      specVersion: '1.4',
      components: [
        { type: 'cryptographic-asset', name: 'RSA' },
        { type: 'cryptographic-asset', name: 'X', cryptoProperties: { assetType: 'cipher' } },
        'oops'
      ]
    });
    expect(res.valid).toBe(false);
    expect(res.errors).toEqual([
      'bom: bomFormat must be CycloneDX',
      'bom: specVersion 1.4 predates cryptoProperties',
      'bom.components[0].cryptoProperties missing',
      'bom.components[1].cryptoProperties.assetType invalid',
      'bom.components[2] not an object'
    ]);
  });

  it('labels findings with the given document label', () => {
    expect(inspectCycloneDxShape([], 'bom[1]').errors).toEqual(['bom[1]: document not an object']);
    expect(inspectCycloneDxShape({ bomFormat: 'CycloneDX', components: {} }, 'bom[0]').errors).toEqual([
      'bom[0]: specVersion missing',
      'bom[0]: components must be array'
    ]);
  });
});
