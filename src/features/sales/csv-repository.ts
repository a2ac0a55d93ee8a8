import { promises as fs } from "node:fs";
import path from "node:path";

import { parseCsvBuffer, type ParseCsvOptions } from "@/lib/csv/parse";
import { toTransactionRecords } from "@/features/sales/schema";
import { isInRange, newestFirst, sortedDistinct, type SalesRepository } from "@/features/sales/repository";
import type { DateRange, TransactionRecord } from "@/types/domain";

// exports from the sales system are UTF-8 or Latin-1, comma or semicolon separated
export const SALES_EXPORT_HINT: ParseCsvOptions = {
  encodings: ["utf-8", "windows-1252"],
  delimiters: [",", ";"]
};

interface LoadedFile {
  signature: string;
  records: TransactionRecord[];
}

/**
 * Sales export kept as a CSV file (same columns as the `vendas` query).
 * The parsed file is reused until its size or mtime changes.
 */
export class CsvSalesRepository implements SalesRepository {
  private readonly filePath: string;
  private loaded: LoadedFile | null = null;

  constructor(
    filePath: string,
    private readonly parseHint: ParseCsvOptions = SALES_EXPORT_HINT
  ) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async fetchSales(range: DateRange): Promise<TransactionRecord[]> {
    const records = await this.readRecords();
    return newestFirst(records.filter((record) => isInRange(record.emissionDate, range)));
  }

  async listProducts(): Promise<string[]> {
    const records = await this.readRecords();
    return sortedDistinct(records.map((record) => record.productId));
  }

  async listCities(): Promise<string[]> {
    const records = await this.readRecords();
    return sortedDistinct(records.map((record) => record.city));
  }

  async listSalespeople(): Promise<string[]> {
    const records = await this.readRecords();
    return sortedDistinct(records.map((record) => record.salespersonId));
  }

  private async readRecords(): Promise<TransactionRecord[]> {
    const stat = await fs.stat(this.filePath);
    const signature = `${stat.size}:${Math.floor(stat.mtimeMs)}`;
    if (this.loaded && this.loaded.signature === signature) {
      return this.loaded.records;
    }

    const buffer = await fs.readFile(this.filePath);
    const records = this.parseRecords(new Uint8Array(buffer));

    this.loaded = { signature, records };
    return records;
  }

  private parseRecords(bytes: Uint8Array): TransactionRecord[] {
    const source = path.basename(this.filePath);
    try {
      return toTransactionRecords(parseCsvBuffer(bytes, this.parseHint), source);
    } catch {
      // files outside the usual shape get the full encoding and delimiter search
      return toTransactionRecords(parseCsvBuffer(bytes), source);
    }
  }
}
