/**
 * Neo4j Graph Client
 * Session and transaction handling for the graph store, behind the narrow
 * GraphClient interface the backend depends on
 */

import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Driver, ManagedTransaction, Session } from 'neo4j-driver';
import { NEO4J_DRIVER } from '../store.constants';

export type CypherParameters = Record<string, unknown>;

export interface GraphRow {
  get(key: string): unknown;
}

export interface GraphQueryResult {
  records: GraphRow[];
  nodesDeleted: number;
}

export interface GraphTransaction {
  run(query: string, parameters: CypherParameters): Promise<GraphQueryResult>;
}

export interface GraphClient {
  write<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T>;
  read<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T>;
}

function toGraphTransaction(tx: ManagedTransaction): GraphTransaction {
  return {
    run: async (query, parameters) => {
      const result = await tx.run(query, parameters);
      return {
        records: result.records.map((record) => ({
          get: (key: string): unknown => record.get(key),
        })),
        nodesDeleted: result.summary.counters.updates().nodesDeleted,
      };
    },
  };
}

@Injectable()
export class Neo4jGraphClient implements GraphClient {
  private readonly database: string | undefined;

  constructor(
    @Inject(NEO4J_DRIVER) private readonly driver: Driver,
    configService: ConfigService,
  ) {
    this.database = configService.get<string>('NEO4J_DATABASE');
  }

  write<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return this.inSession((session) =>
      session.executeWrite((tx) => work(toGraphTransaction(tx))),
    );
  }

  read<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    return this.inSession((session) =>
      session.executeRead((tx) => work(toGraphTransaction(tx))),
    );
  }

  private async inSession<T>(task: (session: Session) => Promise<T>): Promise<T> {
    const session = this.driver.session({ database: this.database });
    try {
      return await task(session);
    } finally {
      await session.close();
    }
  }
}
