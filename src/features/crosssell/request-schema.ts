import { z } from "zod";

import { parseEmissionDate } from "@/features/sales/schema";
import type { FilterValue } from "@/types/domain";

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "use o formato AAAA-MM-DD")
  .refine((value) => parseEmissionDate(value) === value, "data inexistente");

export const periodSchema = z
  .object({
    startDate: isoDateSchema,
    endDate: isoDateSchema
  })
  .refine((period) => period.startDate <= period.endDate, {
    message: "a data inicial deve ser anterior ou igual à data final",
    path: ["endDate"]
  });

const filterValueSchema = z
  .union([z.literal("all"), z.array(z.string().min(1))])
  .default("all")
  .transform((value): FilterValue => (value === "all" || value.length === 0 ? "all" : Array.from(new Set(value))));

export const filtersSchema = z
  .object({
    city: filterValueSchema,
    salesperson: filterValueSchema,
    activity: filterValueSchema,
    network: filterValueSchema
  })
  .default({});

const productSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim()).pipe(z.string().min(1));

export const crossSellRequestSchema = z
  .object({
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    productA: productSchema,
    productB: productSchema,
    filters: filtersSchema
  })
  .refine((body) => body.startDate <= body.endDate, {
    message: "a data inicial deve ser anterior ou igual à data final",
    path: ["endDate"]
  })
  .transform((body) => ({
    period: { startDate: body.startDate, endDate: body.endDate },
    productA: body.productA,
    productB: body.productB,
    filters: body.filters
  }));

export const exportPartitionSchema = z.object({
  partition: z.enum(["onlyA", "onlyB", "both"])
});
