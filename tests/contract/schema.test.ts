import { describe, it, expect } from 'vitest';
import { contractToDocument, parseContract } from '../../engine/contract/schema.js';
import { ContractFormatError } from '../../engine/errors.js';

const doc = {
  version: '1.0',
  repo_id: 'orders-service',
  role: 'provider',
  last_updated: '2024-11-27T10:00:00Z',
  endpoints: [
    {
      id: 'get-orders-id',
      path: '/orders/{id}',
      method: 'get',
      implemented_at: '2024-11-27T10:00:00Z',
      source_file: 'backend/orders.py',
      function_name: 'get_order',
      parameters: [{ name: 'id', type: 'int' }],
      response: { status: 200, type: 'object', schema: 'Order', example: { id: 1 } },
      consumers: ['web'],
    },
    { path: '/orders', method: 'POST' },
  ],
  models: { Order: { fields: [{ name: 'id', type: 'int' }] } },
};

describe('contract schema', () => {
  it('parses a document into a contract with defaults filled in', () => {
    const contract = parseContract(doc);

    expect(contract.repoId).toBe('orders-service');
    expect(contract.endpoints).toHaveLength(2);
    expect(contract.endpoints[0].method).toBe('GET');
    expect(contract.endpoints[0].parameters).toEqual([{ name: 'id', type: 'int', required: true }]);
    expect(contract.endpoints[0].response.example).toEqual({ id: 1 });
    expect(contract.endpoints[1]).toEqual({
      id: 'post-orders',
      path: '/orders',
      method: 'POST',
      status: 'implemented',
      implementedAt: null,
      sourceFile: null,
      functionName: null,
      parameters: [],
      response: {},
      consumers: [],
    });
    expect(contract.models.Order.fields).toEqual([{ name: 'id', type: 'int' }]);
  });

  it('accepts a numeric version', () => {
    expect(parseContract({ ...doc, version: 2 }).version).toBe('2');
  });

  it('rejects an unknown method', () => {
    const bad = { ...doc, endpoints: [{ path: '/orders', method: 'FETCH' }] };
    expect(() => parseContract(bad, 'orders.yaml')).toThrow(ContractFormatError);
    expect(() => parseContract(bad, 'orders.yaml')).toThrow(/^Invalid contract document: endpoints\.0\.method/);
  });

  it('rejects a document without last_updated', () => {
    const { last_updated: _omit, ...rest } = doc;
    expect(() => parseContract(rest)).toThrow(/last_updated: /);
  });

  it('rejects duplicate (method, path) pairs', () => {
    const bad = {
      ...doc,
      endpoints: [
        { path: '/orders', method: 'GET' },
        { path: '/orders', method: 'get' },
      ],
    };
    expect(() => parseContract(bad, 'orders.yaml')).toThrow(
      'Invalid contract document: duplicate endpoint GET /orders (orders.yaml)',
    );
  });

  it('converts back to the snake_case document', () => {
    const out = contractToDocument(parseContract(doc));
    expect(out.repo_id).toBe('orders-service');
    expect(out.endpoints[0]).toMatchObject({
      method: 'GET',
      implemented_at: '2024-11-27T10:00:00Z',
      source_file: 'backend/orders.py',
      function_name: 'get_order',
      consumers: ['web'],
    });
    expect(out.endpoints[1].implemented_at).toBeNull();
  });
});
