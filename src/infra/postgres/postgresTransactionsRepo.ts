import type {
  CreateTransactionInput,
  ListTransactionsOptions,
  Transaction,
  TransactionsRepository
} from "../../modules/transactions/transactions.repository";
import { kindFromColumns } from "../../modules/transactions/kinds";
import type { SqlExecutor } from "./pool";

type TransactionRow = {
  transaction_id: string;
  account_number: string;
  kind: string;
  category: string | null;
  amount_cents: string;
  description: string;
  transaction_date: Date | string;
};

const TRANSACTION_COLUMNS = `
  transaction_id,
  account_number,
  kind,
  category,
  amount_cents,
  description,
  transaction_date
`;

// BIGSERIAL and BIGINT columns arrive as strings.
function toTransaction(row: TransactionRow): Transaction {
  return {
    transactionId: Number(row.transaction_id),
    accountNumber: row.account_number,
    kind: kindFromColumns(row.kind, row.category),
    amountCents: Number(row.amount_cents),
    description: row.description,
    transactionDate: new Date(row.transaction_date).toISOString()
  };
}

export class PostgresTransactionsRepository implements TransactionsRepository {
  constructor(private readonly run: SqlExecutor) {}

  async listByAccount(
    accountNumber: string,
    options: ListTransactionsOptions = {}
  ): Promise<Transaction[]> {
    const params: Array<string | number> = [accountNumber];
    let limitClause = "";
    if (options.limit !== undefined) {
      params.push(options.limit);
      limitClause = ` LIMIT $${params.length}`;
    }

    const result = await this.run<TransactionRow>(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE account_number = $1
      ORDER BY transaction_id DESC${limitClause};
      `,
      params
    );

    const newestFirst = result.rows.map(toTransaction);
    return options.order === "desc" ? newestFirst : newestFirst.reverse();
  }

  async append(inputs: CreateTransactionInput[]): Promise<Transaction[]> {
    if (inputs.length === 0) {
      return [];
    }

    // One multi-row INSERT: the batch commits or fails as a single statement.
    const values: unknown[] = [];
    const tuples = inputs.map((input) => {
      const category = input.kind.type === "CATEGORY_FUNDING" ? input.kind.category : null;
      values.push(
        input.accountNumber,
        input.kind.type,
        category,
        input.amountCents,
        input.description,
        input.transactionDate
      );
      const offset = values.length - 6;
      return `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5}, $${offset + 6})`;
    });

    const result = await this.run<TransactionRow>(
      `
      INSERT INTO transactions (
        account_number,
        kind,
        category,
        amount_cents,
        description,
        transaction_date
      )
      VALUES ${tuples.join(", ")}
      RETURNING ${TRANSACTION_COLUMNS};
      `,
      values
    );

    return result.rows
      .map(toTransaction)
      .sort((a, b) => a.transactionId - b.transactionId);
  }
}
