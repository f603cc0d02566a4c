import {
  LookupError,
  ProtocolError,
  ReconcileError,
  RpcError,
  TransportError,
  ValidationError,
} from '../errors';

describe('error taxonomy', () => {
  it('groups transport and protocol failures under RpcError', () => {
    const transport = new TransportError('HTTP 503', 503);
    const protocol = new ProtocolError('Error -32602', -32602, 'details');

    expect(transport).toBeInstanceOf(RpcError);
    expect(protocol).toBeInstanceOf(RpcError);
    expect(transport).toMatchObject({ kind: 'transport', status: 503, name: 'TransportError' });
    expect(protocol).toMatchObject({ kind: 'protocol', code: -32602, data: 'details', name: 'ProtocolError' });
  });

  it('names the missing entity in lookup failures', () => {
    const error = new LookupError('hostgroup', 'Linux servers');

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error.message).toBe("hostgroup 'Linux servers' not found");
    expect(error.kind).toBe('lookup');
  });

  it('keeps validation failures out of the RPC branch', () => {
    const error = new ValidationError('dns and ip are exclusive');

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).not.toBeInstanceOf(RpcError);
    expect(error.kind).toBe('validation');
  });
});
