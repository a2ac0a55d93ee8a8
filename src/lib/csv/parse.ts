import Papa from "papaparse";

const ENCODING_CANDIDATES = ["utf-8", "windows-1252", "utf-16le"] as const;
const DELIMITER_CANDIDATES = [",", ";", "\t", "|"] as const;

export type CsvRow = Record<string, string>;

export interface ParseCsvOptions {
  encodings?: readonly string[];
  delimiters?: readonly string[];
}

interface ParseCandidate {
  rows: CsvRow[];
  score: number;
}

function textQualityScore(text: string): number {
  let replacement = 0;
  let control = 0;
  let readable = 0;

  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (ch === "\uFFFD") {
      replacement += 1;
      continue;
    }
    if (code <= 8 || code === 11 || code === 12 || (code >= 14 && code <= 31)) {
      control += 1;
      continue;
    }
    if (/[A-Za-zÀ-ÿ0-9\s_()\-\/,.:]/.test(ch)) {
      readable += 1;
    }
  }

  return readable - replacement * 12 - control * 12;
}

function rowsQualityScore(rows: CsvRow[]): number {
  const first = rows[0] ?? {};
  const headerText = Object.keys(first).join(" ");
  const valueText = rows
    .slice(0, 8)
    .flatMap((row) => Object.values(row).slice(0, 6))
    .join(" ");

  return textQualityScore(`${headerText} ${valueText}`);
}

function normalizeText(text: string): string {
  const withoutBom = text.replace(/^\uFEFF/, "");
  const withoutExcelSep = withoutBom.replace(/^sep=.+\r?\n/i, "");
  return withoutExcelSep.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

function decodeWithEncoding(bytes: Uint8Array, encoding: string): string | null {
  try {
    return normalizeText(new TextDecoder(encoding, { fatal: encoding === "utf-8" }).decode(bytes));
  } catch {
    // fatal utf-8 decoding rejects latin-1 exports; the next candidate takes over
    return null;
  }
}

function normalizeRows(rows: Record<string, unknown>[]): CsvRow[] {
  return rows
    .map((row) => {
      const normalized: CsvRow = {};
      for (const [key, value] of Object.entries(row)) {
        normalized[key.trim()] = String(value ?? "").trim();
      }
      return normalized;
    })
    .filter((row) => Object.values(row).some((value) => value.length > 0));
}

function parseWithHeader(text: string, delimiter?: string): ParseCandidate | null {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const rows = normalizeRows(result.data);
  const headerCount = result.meta.fields?.length ?? 0;
  if (headerCount < 2 || rows.length === 0) {
    return null;
  }

  const mismatchCount = result.errors.filter((error) => error.type === "FieldMismatch").length;
  const score = rows.length * 10 + headerCount * 3 - mismatchCount * 4 - result.errors.length * 2 + rowsQualityScore(rows);
  return { rows, score };
}

function hasUtf8Bom(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;
}

export function parseCsvBuffer(buffer: Uint8Array, options: ParseCsvOptions = {}): CsvRow[] {
  // a UTF-8 byte order mark settles the encoding
  const encodings = hasUtf8Bom(buffer) ? ["utf-8"] : options.encodings ?? ENCODING_CANDIDATES;
  const delimiters = options.delimiters ?? DELIMITER_CANDIDATES;
  const candidates: ParseCandidate[] = [];

  for (const encoding of encodings) {
    const text = decodeWithEncoding(buffer, encoding);
    if (text === null) {
      continue;
    }

    for (const delimiter of delimiters) {
      const candidate = parseWithHeader(text, delimiter);
      if (candidate) {
        candidates.push(candidate);
      }
    }
  }

  if (candidates.length === 0) {
    throw new Error("Erro ao ler CSV: formato não reconhecido. Verifique a codificação (UTF-8/Latin-1) e o separador (, ; tab |).");
  }

  return candidates.sort((a, b) => b.score - a.score)[0].rows;
}
