import knex from "knex";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { KnexSalesRepository } from "@/features/sales/knex-repository";

interface CompiledQuery {
  sql: string;
  bindings: readonly unknown[];
  method: string;
}

interface QueryRunner {
  query(connection: unknown, query: CompiledQuery): Promise<unknown>;
  acquireConnection(): Promise<unknown>;
  releaseConnection(connection: unknown): Promise<unknown>;
}

const catalog = { productMinCost: 0.01, productDivisions: [2, 3], customerState: "MG" };

describe("KnexSalesRepository", () => {
  let executed: CompiledQuery[];
  let rows: Array<Record<string, unknown>>;
  let repository: KnexSalesRepository;

  beforeEach(() => {
    executed = [];
    rows = [];
    const db = knex({ client: "pg" });
    const runner: QueryRunner = db.client;
    vi.spyOn(runner, "acquireConnection").mockResolvedValue({});
    vi.spyOn(runner, "releaseConnection").mockResolvedValue(undefined);
    vi.spyOn(runner, "query").mockImplementation(async (_connection, query) => {
      executed.push(query);
      return { ...query, response: { command: "SELECT", rows } };
    });
    repository = new KnexSalesRepository(db, catalog);
  });

  it("selects the period's sales with an inclusive date range, newest first", async () => {
    await repository.fetchSales({ startDate: "2024-01-01", endDate: "2024-01-31" });

    expect(executed).toHaveLength(1);
    const [query] = executed;
    expect(query.sql).toContain(
      'from "vendas" as "v" inner join "clientes" as "c" on "v"."cliente" = "c"."cliente" left join "mercadorias" as "m" on "v"."mercadoria" = "m"."mercadoria"'
    );
    expect(query.sql).toContain("to_char(v.data_emissao::date, 'YYYY-MM-DD') as data_emissao");
    expect(query.sql).toContain('"m"."descricao" as "descricao_produto"');
    expect(query.sql).toContain('where v.data_emissao::date between ? and ? order by "v"."data_emissao" desc');
    expect(query.bindings).toEqual(["2024-01-01", "2024-01-31"]);
  });

  it("maps driver rows to transaction records", async () => {
    rows = [
      {
        cliente: 1001,
        mercadoria: "PA",
        data_emissao: "2024-01-05",
        valor_liq: 1250.5,
        quant: 5,
        vendedor: 7,
        cidade: "Betim",
        raz_social: "Alfa Comércio",
        atividade: "Varejo",
        rede: null,
        descricao_produto: "Cadeira"
      }
    ];

    const sales = await repository.fetchSales({ startDate: "2024-01-01", endDate: "2024-01-31" });

    expect(sales).toEqual([
      {
        customerId: "1001",
        productId: "PA",
        emissionDate: "2024-01-05",
        netValue: 1250.5,
        quantity: 5,
        salespersonId: "7",
        city: "Betim",
        legalName: "Alfa Comércio",
        activity: "Varejo",
        network: null,
        productDescription: "Cadeira"
      }
    ]);
  });

  it("returns no sales for an empty period", async () => {
    await expect(repository.fetchSales({ startDate: "2024-01-01", endDate: "2024-01-31" })).resolves.toEqual([]);
  });

  it("lists catalog products above the minimum cost in the allowed divisions", async () => {
    rows = [{ mercadoria: 10 }, { mercadoria: "PB" }, { mercadoria: null }];

    await expect(repository.listProducts()).resolves.toEqual(["10", "PB"]);
    expect(executed[0].sql).toBe(
      'select distinct "v"."mercadoria" from "vendas" as "v" inner join "mercadorias" as "m" on "m"."mercadoria" = "v"."mercadoria" where "m"."custo_inf" > ? and "m"."divisao" in (?, ?) order by "v"."mercadoria" asc'
    );
    expect(executed[0].bindings).toEqual([0.01, 2, 3]);
  });

  it("lists the cities of the configured state", async () => {
    rows = [{ cidade: "Betim" }];

    await expect(repository.listCities()).resolves.toEqual(["Betim"]);
    expect(executed[0].sql).toBe(
      'select distinct "c"."cidade" from "vendas" as "v" inner join "clientes" as "c" on "v"."cliente" = "c"."cliente" where "c"."cidade" is not null and "c"."uf" = ? order by "c"."cidade" asc'
    );
    expect(executed[0].bindings).toEqual(["MG"]);
  });

  it("lists salespeople who were not dismissed", async () => {
    rows = [{ vendedor: "V1" }];

    await expect(repository.listSalespeople()).resolves.toEqual(["V1"]);
    expect(executed[0].sql).toBe(
      'select distinct "v"."vendedor" from "vendas" as "v" inner join "vendedores" as "ve" on "ve"."vendedor" = "v"."vendedor" where "ve"."data_desligamento" is null order by "v"."vendedor" asc'
    );
    expect(executed[0].bindings).toEqual([]);
  });
});
