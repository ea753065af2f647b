import { z } from "zod";
import { getLogger } from "@src/util/logger";
import { errorMessage, fail, ok, type Result } from "@src/util/result";
import { CompanyRepository } from "./db/company_repository";

// Real numbers or numeric strings only; null and blank values are rejected
const FigureSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

export const EarningsRecordSchema = z.object({
  period: z.union([z.string(), z.number()]).transform(String),
  earnings: FigureSchema,
  revenue: FigureSchema.optional(),
});

export type EarningsRecord = z.infer<typeof EarningsRecordSchema>;

export interface EarningsProvider {
  getEarnings(symbol: string): Promise<Result<EarningsRecord[]>>;
}

interface CompanyLookup {
  getByCode(params: { code: string }): Promise<Record<string, unknown> | null>;
}

export interface CompanyEarningsProviderOptions {
  tableName: string;
  repository?: CompanyLookup;
}

/**
 * Earnings history from the `earnings` attribute of the company item.
 * A missing item or attribute is reported as unavailable.
 */
export function createCompanyEarningsProvider(
  options: CompanyEarningsProviderOptions
): EarningsProvider {
  const logger = getLogger("market/earnings_provider");
  const repo =
    options.repository ??
    new CompanyRepository({ tableName: options.tableName });

  return {
    async getEarnings(symbol) {
      try {
        const item = await repo.getByCode({ code: symbol });
        if (!item) return fail(`no company record for ${symbol}`);

        const parsed = z.array(EarningsRecordSchema).safeParse(item["earnings"]);
        if (!parsed.success) {
          logger.warn(
            { symbol, issues: parsed.error.issues.length },
            "invalid earnings attribute"
          );
          return fail(`no earnings history for ${symbol}`);
        }
        return ok(parsed.data);
      } catch (err) {
        logger.error({ symbol, err }, "earnings lookup failed");
        return fail(errorMessage(err));
      }
    },
  };
}
