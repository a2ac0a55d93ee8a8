import { getConfig, type AppConfig } from "@/lib/config";
import { CrossSellError } from "@/lib/errors";
import { CachedSalesRepository, createSalesCaches } from "@/features/sales/cached-repository";
import { CsvSalesRepository } from "@/features/sales/csv-repository";
import { createPostgresClient, KnexSalesRepository } from "@/features/sales/knex-repository";
import type { SalesRepository } from "@/features/sales/repository";

const CONNECTION_ERROR_MESSAGE = "Não foi possível conectar ao banco de dados. Verifique as configurações.";

export function createSalesRepository(config: AppConfig): SalesRepository {
  const inner =
    config.source === "csv"
      ? new CsvSalesRepository(config.csvPath)
      : config.postgres
        ? new KnexSalesRepository(createPostgresClient(config.postgres), config.catalog)
        : null;

  if (!inner) {
    throw new CrossSellError("SOURCE_UNAVAILABLE", CONNECTION_ERROR_MESSAGE);
  }

  return new CachedSalesRepository(inner, createSalesCaches(config.cacheTtlMs));
}

let sharedRepository: SalesRepository | null = null;

export function getSalesRepository(): SalesRepository {
  if (sharedRepository) {
    return sharedRepository;
  }

  try {
    sharedRepository = createSalesRepository(getConfig());
    return sharedRepository;
  } catch (error) {
    if (error instanceof CrossSellError) {
      throw error;
    }
    throw new CrossSellError("SOURCE_UNAVAILABLE", CONNECTION_ERROR_MESSAGE, { cause: error });
  }
}
