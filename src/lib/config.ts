import { z } from "zod";

const DEFAULT_PRODUCT_DIVISIONS = "2,3,4,5,6,7,10,11,12,14,15,16";

const divisionListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean)
      .map(Number)
  )
  .refine((divisions) => divisions.length > 0 && divisions.every((division) => Number.isInteger(division)), {
    message: "lista de divisões deve conter inteiros separados por vírgula"
  });

const envSchema = z.object({
  SALES_SOURCE: z.enum(["postgres", "csv"]).default("csv"),
  SALES_CSV_PATH: z.string().min(1).default("docs/vendas.csv"),
  POSTGRES_HOST: z.string().min(1).optional(),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: z.string().min(1).optional(),
  POSTGRES_USER: z.string().min(1).optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  SALES_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(10 * 60 * 1000),
  PRODUCT_MIN_COST: z.coerce.number().nonnegative().default(0.01),
  PRODUCT_DIVISIONS: divisionListSchema.default(DEFAULT_PRODUCT_DIVISIONS),
  CUSTOMER_STATE: z.string().min(2).default("MG")
});

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface CatalogConfig {
  productMinCost: number;
  productDivisions: number[];
  customerState: string;
}

export interface AppConfig {
  source: "postgres" | "csv";
  csvPath: string;
  postgres: PostgresConfig | null;
  cacheTtlMs: number;
  catalog: CatalogConfig;
}

type Env = Record<string, string | undefined>;

export function parseConfig(env: Env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`Configuração inválida: ${fields}`);
  }

  const values = parsed.data;
  const postgres =
    values.POSTGRES_HOST && values.POSTGRES_DB && values.POSTGRES_USER
      ? {
          host: values.POSTGRES_HOST,
          port: values.POSTGRES_PORT,
          database: values.POSTGRES_DB,
          user: values.POSTGRES_USER,
          password: values.POSTGRES_PASSWORD ?? ""
        }
      : null;

  return {
    source: values.SALES_SOURCE,
    csvPath: values.SALES_CSV_PATH,
    postgres,
    cacheTtlMs: values.SALES_CACHE_TTL_MS,
    catalog: {
      productMinCost: values.PRODUCT_MIN_COST,
      productDivisions: values.PRODUCT_DIVISIONS,
      customerState: values.CUSTOMER_STATE
    }
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}
