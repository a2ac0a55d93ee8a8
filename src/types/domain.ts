export type CustomerId = string;
export type ProductId = string;

export interface TransactionRecord {
  customerId: CustomerId;
  productId: ProductId;
  emissionDate: string;
  netValue: number;
  quantity: number;
  salespersonId: string | null;
  city: string | null;
  legalName: string | null;
  activity: string | null;
  network: string | null;
  productDescription: string | null;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}

export type FilterValue = "all" | string[];

export interface SalesFilters {
  city: FilterValue;
  salesperson: FilterValue;
  activity: FilterValue;
  network: FilterValue;
}

export type FilterField = keyof SalesFilters;

export interface FilterOptions {
  products: ProductId[];
  cities: string[];
  salespeople: string[];
  activities: string[];
  networks: string[];
}

export interface ReferenceLists {
  products: ProductId[];
  cities: string[];
  salespeople: string[];
}

export interface CrossSellResult {
  customersA: CustomerId[];
  customersB: CustomerId[];
  onlyA: CustomerId[];
  onlyB: CustomerId[];
  both: CustomerId[];
  totalA: number;
  totalB: number;
  countOnlyA: number;
  countOnlyB: number;
  countBoth: number;
  totalCustomers: number;
}

export type Partition = "onlyA" | "onlyB" | "both";

interface DetailRowBase {
  customerId: CustomerId;
  legalName: string | null;
  city: string | null;
  activity: string | null;
  network: string | null;
  lastSalesperson: string | null;
  lastPurchase: string;
  totalQuantity: number;
}

export interface SingleProductDetailRow extends DetailRowBase {
  productDescription: string | null;
}

export interface BothProductsDetailRow extends DetailRowBase {
  products: string;
}

export interface DetailTables {
  onlyA: SingleProductDetailRow[];
  onlyB: SingleProductDetailRow[];
  both: BothProductsDetailRow[];
}

export interface CrossSellRequest {
  period: DateRange;
  productA: ProductId;
  productB: ProductId;
  filters: SalesFilters;
}

export interface CrossSellReport {
  period: DateRange;
  productA: ProductId;
  productB: ProductId;
  loadedCount: number;
  filteredCount: number;
  analysis: CrossSellResult;
  conversionRate: number;
  tables: DetailTables;
}
