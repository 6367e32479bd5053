import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

export function createQueryResult<T extends QueryResultRow>(rows: T[] = [], rowCount?: number): QueryResult<T> {
    return {
        rows,
        rowCount: rowCount ?? rows.length,
        command: '',
        oid: 0,
        fields: [],
    };
}

export function createMockPool() {
    const query = jest.fn<Promise<QueryResult<any>>, [string, unknown[]?]>();
    const release = jest.fn();
    const clientQuery = jest.fn<Promise<QueryResult<any>>, [string, unknown[]?]>();
    const connect = jest.fn<Promise<PoolClient>, []>().mockResolvedValue({
        query: clientQuery as any,
        release,
    } as unknown as PoolClient);

    const pool = {
        query: query as any,
        connect,
    } as unknown as Pool;

    return { pool, query, connect, clientQuery, release };
}
