import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthError,
  BufferNotFlushedError,
  NetworkError,
  TransientAlterError,
  TransientWriteError,
  WarehouseError,
} from '@catalogsync/core';

const mocks = vi.hoisted(() => {
  const table = { exists: vi.fn(), getMetadata: vi.fn(), insert: vi.fn() };
  const dataset = { table: vi.fn(() => table), createTable: vi.fn() };
  const job = { getQueryResults: vi.fn(async (): Promise<unknown[]> => [[]]) };
  const client = { dataset: vi.fn(() => dataset), createQueryJob: vi.fn(async () => [job]) };
  return { table, dataset, job, client };
});

vi.mock('@google-cloud/bigquery', () => ({
  BigQuery: vi.fn(function () {
    return mocks.client;
  }),
}));

// Imports after mocks
import { BigQuery } from '@google-cloud/bigquery';
import { BigQueryWarehouse } from '../src/warehouse.js';

function apiError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

function warehouse(): BigQueryWarehouse {
  return new BigQueryWarehouse({ projectId: 'test-project', datasetId: 'catalog', location: 'EU' });
}

describe('BigQueryWarehouse', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('passes connection settings to the client', () => {
    new BigQueryWarehouse({
      projectId: 'test-project',
      datasetId: 'catalog',
      credentials: { client_email: 'sync@test-project.iam.example', private_key: 'test-key' },
    });

    expect(BigQuery).toHaveBeenCalledWith({
      projectId: 'test-project',
      location: undefined,
      credentials: { client_email: 'sync@test-project.iam.example', private_key: 'test-key' },
      keyFilename: undefined,
    });
  });

  it('rejects invalid dataset names', () => {
    expect(() => new BigQueryWarehouse({ projectId: 'test-project', datasetId: 'cat`alog' })).toThrow(
      WarehouseError
    );
  });

  it('checks table existence', async () => {
    mocks.table.exists.mockResolvedValueOnce([false]);

    await expect(warehouse().tableExists('service')).resolves.toBe(false);
    expect(mocks.client.dataset).toHaveBeenCalledWith('catalog');
    expect(mocks.dataset.table).toHaveBeenCalledWith('service');
  });

  it('reads the persisted schema back as columns', async () => {
    mocks.table.getMetadata.mockResolvedValueOnce([
      {
        schema: {
          fields: [
            { name: 'identifier', type: 'STRING', mode: 'REQUIRED' },
            { name: 'replicas', type: 'INTEGER', mode: 'NULLABLE' },
            { name: 'score', type: 'NUMERIC' },
            { name: 'healthy', type: 'BOOLEAN' },
            { name: 'seen_at', type: 'DATETIME' },
            { name: 'payload', type: 'JSON', description: 'Raw payload' },
            { name: 'team', type: 'STRING', mode: 'REPEATED' },
          ],
        },
      },
    ]);

    await expect(warehouse().getSchema('service')).resolves.toEqual([
      { name: 'identifier', kind: 'STRING', mode: 'NULLABLE' },
      { name: 'replicas', kind: 'INT64', mode: 'NULLABLE' },
      { name: 'score', kind: 'FLOAT64', mode: 'NULLABLE' },
      { name: 'healthy', kind: 'BOOL', mode: 'NULLABLE' },
      { name: 'seen_at', kind: 'TIMESTAMP', mode: 'NULLABLE' },
      { name: 'payload', kind: 'JSON_STRING', mode: 'NULLABLE', description: 'Raw payload' },
      { name: 'team', kind: 'STRING', mode: 'REPEATED' },
    ]);
  });

  it('creates tables from column definitions', async () => {
    mocks.dataset.createTable.mockResolvedValueOnce([{}]);

    await warehouse().createTable('service', [
      { name: 'identifier', kind: 'STRING', mode: 'NULLABLE', description: 'Entity identifier' },
      { name: 'team', kind: 'STRING', mode: 'REPEATED' },
      { name: 'replicas', kind: 'FLOAT64', mode: 'NULLABLE' },
      { name: 'metadata', kind: 'JSON_STRING', mode: 'NULLABLE' },
    ]);

    expect(mocks.dataset.createTable).toHaveBeenCalledWith('service', {
      schema: {
        fields: [
          { name: 'identifier', type: 'STRING', mode: 'NULLABLE', description: 'Entity identifier' },
          { name: 'team', type: 'STRING', mode: 'REPEATED' },
          { name: 'replicas', type: 'FLOAT', mode: 'NULLABLE' },
          { name: 'metadata', type: 'STRING', mode: 'NULLABLE' },
        ],
      },
    });
  });

  it('treats a table created concurrently as created', async () => {
    mocks.dataset.createTable.mockRejectedValueOnce(
      apiError('Already Exists: Table test-project:catalog.service', { code: 409 })
    );

    await expect(
      warehouse().createTable('service', [{ name: 'identifier', kind: 'STRING', mode: 'NULLABLE' }])
    ).resolves.toBeUndefined();
  });

  it('adds and drops columns with one DDL statement', async () => {
    await warehouse().alterTable(
      'service',
      [
        { name: 'tags', kind: 'STRING', mode: 'REPEATED' },
        { name: 'owner', kind: 'STRING', mode: 'NULLABLE', description: 'Owning "team"' },
      ],
      ['legacy']
    );

    expect(mocks.client.createQueryJob).toHaveBeenCalledWith({
      query: [
        'ALTER TABLE `test-project.catalog.service`',
        '  ADD COLUMN IF NOT EXISTS `tags` ARRAY<STRING>,',
        '  ADD COLUMN IF NOT EXISTS `owner` STRING OPTIONS(description="Owning \\"team\\""),',
        '  DROP COLUMN IF EXISTS `legacy`',
      ].join('\n'),
      location: 'EU',
    });
    expect(mocks.job.getQueryResults).toHaveBeenCalledTimes(1);
  });

  it('does nothing for an empty alteration', async () => {
    await warehouse().alterTable('service', [], []);

    expect(mocks.client.createQueryJob).not.toHaveBeenCalled();
  });

  it('rejects malicious column names before running SQL', async () => {
    await expect(
      warehouse().alterTable('service', [], ['id;DROP TABLE users;'])
    ).rejects.toBeInstanceOf(WarehouseError);
    expect(mocks.client.createQueryJob).not.toHaveBeenCalled();
  });

  it('classifies failed schema changes as transient', async () => {
    mocks.client.createQueryJob.mockRejectedValueOnce(
      apiError('Exceeded rate limits: too many table update operations', {
        code: 403,
        errors: [{ reason: 'rateLimitExceeded' }],
      })
    );

    await expect(
      warehouse().alterTable('service', [{ name: 'tags', kind: 'STRING', mode: 'REPEATED' }], [])
    ).rejects.toBeInstanceOf(TransientAlterError);
  });

  it('streams rows with their sync ids as insert ids', async () => {
    mocks.table.insert.mockResolvedValueOnce([{}]);
    const rows = [
      { identifier: 'svc-1', _sync_id: 'sync-1' },
      { identifier: 'svc-2', _sync_id: 'sync-2' },
    ];

    await expect(warehouse().insertRows('service', rows)).resolves.toEqual({ inserted: 2, errors: [] });
    expect(mocks.table.insert).toHaveBeenCalledWith(
      [
        { insertId: 'sync-1', json: rows[0] },
        { insertId: 'sync-2', json: rows[1] },
      ],
      { raw: true, skipInvalidRows: true }
    );
  });

  it('reports rejected rows from a partial failure', async () => {
    mocks.table.insert.mockRejectedValueOnce(
      apiError('A failure occurred during this request.', {
        name: 'PartialFailureError',
        errors: [
          {
            row: { insertId: 'sync-2', json: {} },
            errors: [{ reason: 'invalid', message: 'no such field: extra' }],
          },
        ],
      })
    );

    const result = await warehouse().insertRows('service', [
      { identifier: 'svc-1', _sync_id: 'sync-1' },
      { identifier: 'svc-2', _sync_id: 'sync-2' },
      { identifier: 'svc-3', _sync_id: 'sync-3' },
    ]);

    expect(result).toEqual({ inserted: 2, errors: [{ index: 1, message: 'no such field: extra' }] });
  });

  it('skips the request for an empty batch', async () => {
    await expect(warehouse().insertRows('service', [])).resolves.toEqual({ inserted: 0, errors: [] });
    expect(mocks.table.insert).not.toHaveBeenCalled();
  });

  it('classifies insert failures', async () => {
    mocks.table.insert
      .mockRejectedValueOnce(apiError('Service unavailable', { code: 503 }))
      .mockRejectedValueOnce(apiError('socket hang up', { code: 'ECONNRESET' }))
      .mockRejectedValueOnce(
        apiError('Access Denied: Table service', { code: 403, errors: [{ reason: 'accessDenied' }] })
      )
      .mockRejectedValueOnce(apiError('Invalid value', { code: 400, errors: [{ reason: 'invalid' }] }));
    const rows = [{ identifier: 'svc-1', _sync_id: 'sync-1' }];

    await expect(warehouse().insertRows('service', rows)).rejects.toBeInstanceOf(TransientWriteError);
    await expect(warehouse().insertRows('service', rows)).rejects.toBeInstanceOf(TransientWriteError);
    await expect(warehouse().insertRows('service', rows)).rejects.toBeInstanceOf(AuthError);
    await expect(warehouse().insertRows('service', rows)).rejects.toBeInstanceOf(WarehouseError);
  });

  it('maps unreachable hosts to network errors', async () => {
    mocks.table.exists.mockRejectedValueOnce(
      apiError('getaddrinfo ENOTFOUND bigquery.googleapis.com', { code: 'ENOTFOUND' })
    );

    await expect(warehouse().tableExists('service')).rejects.toBeInstanceOf(NetworkError);
  });

  it('deduplicates and reports removed rows', async () => {
    mocks.job.getQueryResults.mockResolvedValueOnce([[{ removed: 4 }]]);

    await expect(warehouse().deduplicate('service', 'identifier')).resolves.toEqual({ removed: 4 });
    expect(mocks.client.createQueryJob).toHaveBeenCalledWith({
      query: expect.stringContaining(
        'DELETE FROM `test-project.catalog.service` WHERE `identifier` IN (SELECT `identifier` FROM newest_rows);'
      ),
      location: 'EU',
    });
  });

  it('reports nothing removed when the script returns no count', async () => {
    mocks.job.getQueryResults.mockResolvedValueOnce([[]]);

    await expect(warehouse().deduplicate('service', 'identifier')).resolves.toEqual({ removed: 0 });
  });

  it('reports rows still in the streaming buffer', async () => {
    mocks.client.createQueryJob.mockRejectedValueOnce(
      apiError(
        'UPDATE or DELETE statement over table test-project.catalog.service would affect rows in the streaming buffer, which is not supported',
        { code: 400, errors: [{ reason: 'invalidQuery' }] }
      )
    );

    await expect(warehouse().deduplicate('service', 'identifier')).rejects.toBeInstanceOf(
      BufferNotFlushedError
    );
  });
});
