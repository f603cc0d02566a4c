import { ValidationError } from '../errors';
import type { HostInterfaceSpec, InterfaceTypeCode, InterfaceTypeName } from '../types';

export const INTERFACE_TYPE_CODES: Record<InterfaceTypeName, InterfaceTypeCode> = {
  agent: '1',
  SNMP: '2',
  IPMI: '3',
  JMX: '4',
};

export const DEFAULT_INTERFACE_PORTS: Record<InterfaceTypeName, string> = {
  agent: '10050',
  SNMP: '161',
  IPMI: '12345',
  JMX: '623',
};

export interface InterfaceInput {
  type: InterfaceTypeName;
  dns?: string;
  ip?: string;
  port?: string;
  main: string;
}

/**
 * Build the single interface of a host from module parameters.
 * DNS and IP addressing are mutually exclusive; an unspecified port falls back to the type's default.
 */
export function buildInterface(input: InterfaceInput, interfaceId?: string): HostInterfaceSpec {
  const dns = input.dns?.trim() ?? '';
  const ip = input.ip?.trim() ?? '';

  if (dns && ip) {
    throw new ValidationError(
      `Host interface may specify either dns ('${dns}') or ip ('${ip}'), not both`
    );
  }

  const spec: HostInterfaceSpec = {
    type: INTERFACE_TYPE_CODES[input.type],
    main: input.main,
    useip: dns ? '0' : '1',
    ip,
    dns,
    port: input.port?.trim() || DEFAULT_INTERFACE_PORTS[input.type],
  };

  if (interfaceId !== undefined) {
    spec.interfaceid = interfaceId;
  }

  return spec;
}
