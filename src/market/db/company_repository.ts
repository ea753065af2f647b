/**
 * Company repository for reading company profile records.
 *
 * Assumptions:
 * - Primary key: pk = ticker symbol, e.g. "TSM" or "005930.KS"
 * - One item per company; financial history is stored as flattened attributes
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, GetCommand } from "@aws-sdk/lib-dynamodb";

export interface CompanyItem {
  pk: string;
  name?: string;
  exchange?: string;
  [key: string]: unknown;
}

export interface GetClient {
  send(command: GetCommand): Promise<{ Item?: Record<string, unknown> }>;
}

export interface CompanyRepositoryOptions {
  tableName: string;
  client?: GetClient;
}

export class CompanyRepository {
  private readonly table: string;
  private readonly doc: GetClient;

  constructor(options: CompanyRepositoryOptions) {
    this.table = options.tableName;
    this.doc = options.client ?? createGetClient();
  }

  async getByCode(params: { code: string }): Promise<CompanyItem | null> {
    const { code } = params;
    const out = await this.doc.send(
      new GetCommand({ TableName: this.table, Key: { pk: code } })
    );
    if (!out.Item) return null;
    return { ...out.Item, pk: code };
  }
}

function createGetClient(): GetClient {
  const doc = DynamoDBDocumentClient.from(new DynamoDBClient({}));
  return { send: command => doc.send(command) };
}
