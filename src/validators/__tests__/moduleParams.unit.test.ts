import { ValidationError } from '../../errors';
import {
  hostGroupParamsSchema,
  hostParamsSchema,
  parseModuleParams,
  templateParamsSchema,
} from '../moduleParams';

describe('moduleParams schemas', () => {
  describe('hostParamsSchema', () => {
    it('fills defaults', () => {
      const result = hostParamsSchema.safeParse({ name: 'host1' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({
          name: 'host1',
          groups: '',
          templates: '',
          status: 'monitored',
          main: '1',
          type: 'agent',
          state: 'present',
        });
      }
    });

    it('accepts host as an alias of name', () => {
      const result = hostParamsSchema.safeParse({ host: 'host2' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.name).toBe('host2');
        expect(result.data).not.toHaveProperty('host');
      }
    });

    it('normalises numeric port and main to strings', () => {
      const result = hostParamsSchema.safeParse({ name: 'host1', port: 161, main: 0, type: 'SNMP' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.port).toBe('161');
        expect(result.data.main).toBe('0');
      }
    });

    it('rejects unknown status and interface type values', () => {
      expect(hostParamsSchema.safeParse({ name: 'host1', status: 'paused' }).success).toBe(false);
      expect(hostParamsSchema.safeParse({ name: 'host1', type: 'ssh' }).success).toBe(false);
    });

    it('rejects dns and ip together', () => {
      expect(() =>
        parseModuleParams('host', hostParamsSchema, {
          name: 'host1',
          dns: 'host1.example.com',
          ip: '192.0.2.10',
        })
      ).toThrow('Invalid host parameters: ip: dns and ip are mutually exclusive');
    });

    it('treats a blank ip next to a dns name as unset', () => {
      expect(hostParamsSchema.safeParse({ name: 'host1', dns: 'host1.example.com', ip: '  ' }).success).toBe(true);
    });

    it('accepts yes and no as status values', () => {
      expect(hostParamsSchema.safeParse({ name: 'host1', status: 'yes' }).success).toBe(true);
      expect(hostParamsSchema.safeParse({ name: 'host1', status: 'no' }).success).toBe(true);
    });
  });

  describe('hostGroupParamsSchema', () => {
    it('requires a name', () => {
      expect(hostGroupParamsSchema.safeParse({}).success).toBe(false);
      expect(hostGroupParamsSchema.safeParse({ name: '  ' }).success).toBe(false);
    });

    it('rejects the dump state', () => {
      expect(hostGroupParamsSchema.safeParse({ name: 'g1', state: 'dump' }).success).toBe(false);
    });
  });

  describe('templateParamsSchema', () => {
    it('defaults to an empty document and the present state', () => {
      const result = templateParamsSchema.safeParse({ name: 'Template App' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual({ name: 'Template App', json: '', state: 'present' });
      }
    });

    it('accepts the dump state', () => {
      expect(templateParamsSchema.safeParse({ name: 'Template App', state: 'dump' }).success).toBe(true);
    });
  });

  describe('parseModuleParams', () => {
    it('returns parsed data', () => {
      expect(parseModuleParams('hostgroup', hostGroupParamsSchema, { name: ' g1 ' })).toEqual({
        name: 'g1',
        state: 'present',
      });
    });

    it('joins issues into a ValidationError', () => {
      expect(() => parseModuleParams('hostgroup', hostGroupParamsSchema, { state: 'gone' })).toThrow(
        ValidationError
      );
      expect(() => parseModuleParams('hostgroup', hostGroupParamsSchema, { name: '' })).toThrow(
        'Invalid hostgroup parameters: name: name is required'
      );
    });
  });
});
