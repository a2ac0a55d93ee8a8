import knex, { type Knex } from "knex";

import type { CatalogConfig, PostgresConfig } from "@/lib/config";
import { toTransactionRecords } from "@/features/sales/schema";
import type { SalesRepository } from "@/features/sales/repository";
import type { DateRange, TransactionRecord } from "@/types/domain";

export function createPostgresClient(config: PostgresConfig): Knex {
  return knex({
    client: "pg",
    connection: {
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password
    },
    pool: { min: 0, max: 4 }
  });
}

function column(rows: Array<Record<string, unknown>>, name: string): string[] {
  return rows
    .map((row) => row[name])
    .filter((value) => value !== null && value !== undefined)
    .map((value) => String(value));
}

export class KnexSalesRepository implements SalesRepository {
  constructor(
    private readonly db: Knex,
    private readonly catalog: CatalogConfig
  ) {}

  async fetchSales(range: DateRange): Promise<TransactionRecord[]> {
    const rows: Array<Record<string, unknown>> = await this.db("vendas as v")
      .innerJoin("clientes as c", "v.cliente", "c.cliente")
      .leftJoin("mercadorias as m", "v.mercadoria", "m.mercadoria")
      .select(
        "v.cliente",
        "v.mercadoria",
        this.db.raw("to_char(v.data_emissao::date, 'YYYY-MM-DD') as data_emissao"),
        this.db.raw("v.valor_liq::float8 as valor_liq"),
        this.db.raw("v.quant::float8 as quant"),
        "v.vendedor",
        "c.cidade",
        "c.raz_social",
        "c.atividade",
        "c.rede",
        "m.descricao as descricao_produto"
      )
      .whereRaw("v.data_emissao::date between ? and ?", [range.startDate, range.endDate])
      .orderBy("v.data_emissao", "desc");

    return toTransactionRecords(rows, "vendas");
  }

  async listProducts(): Promise<string[]> {
    const rows: Array<Record<string, unknown>> = await this.db("vendas as v")
      .distinct("v.mercadoria")
      .innerJoin("mercadorias as m", "m.mercadoria", "v.mercadoria")
      .where("m.custo_inf", ">", this.catalog.productMinCost)
      .whereIn("m.divisao", this.catalog.productDivisions)
      .orderBy("v.mercadoria");

    return column(rows, "mercadoria");
  }

  async listCities(): Promise<string[]> {
    const rows: Array<Record<string, unknown>> = await this.db("vendas as v")
      .distinct("c.cidade")
      .innerJoin("clientes as c", "v.cliente", "c.cliente")
      .whereNotNull("c.cidade")
      .where("c.uf", this.catalog.customerState)
      .orderBy("c.cidade");

    return column(rows, "cidade");
  }

  async listSalespeople(): Promise<string[]> {
    const rows: Array<Record<string, unknown>> = await this.db("vendas as v")
      .distinct("v.vendedor")
      .innerJoin("vendedores as ve", "ve.vendedor", "v.vendedor")
      .whereNull("ve.data_desligamento")
      .orderBy("v.vendedor");

    return column(rows, "vendedor");
  }
}
