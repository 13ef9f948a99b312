import type { Document, Filter } from 'mongodb';
import type { AggregationExecutor, DocumentReader, FindOptions } from '../../drivers/MongoDriver.js';

export interface AggregateCall {
  collection: string;
  pipeline: Document[];
}

export interface FindCall {
  collection: string;
  filter: Filter<Document>;
  options: FindOptions;
}

/**
 * In-process stand-in for MongoConnection. Replies are queued per call, in
 * order; an empty queue answers with no rows.
 */
export class FakeMongo implements AggregationExecutor, DocumentReader {
  readonly aggregateCalls: AggregateCall[] = [];
  readonly findCalls: FindCall[] = [];
  readonly findOneCalls: Array<{ collection: string; filter: Filter<Document> }> = [];
  findOneResult: Document | null = null;
  failWith: Error | null = null;

  private readonly aggregateReplies: Document[][] = [];
  private readonly findReplies: Document[][] = [];

  replyToAggregate(...replies: Document[][]): this {
    this.aggregateReplies.push(...replies);
    return this;
  }

  replyToFind(...replies: Document[][]): this {
    this.findReplies.push(...replies);
    return this;
  }

  async aggregate<T extends Document>(collection: string, pipeline: Document[]): Promise<T[]> {
    this.aggregateCalls.push({ collection, pipeline });
    if (this.failWith) {
      throw this.failWith;
    }
    return (this.aggregateReplies.shift() ?? []) as T[];
  }

  async find<T extends Document>(
    collection: string,
    filter: Filter<Document> = {},
    options: FindOptions = {}
  ): Promise<T[]> {
    this.findCalls.push({ collection, filter, options });
    return (this.findReplies.shift() ?? []) as T[];
  }

  async findOne<T extends Document>(collection: string, filter: Filter<Document>): Promise<T | null> {
    this.findOneCalls.push({ collection, filter });
    return this.findOneResult as T | null;
  }
}
