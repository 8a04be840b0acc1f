import Database from "better-sqlite3";
import type { Draft, NewsItem } from "../src/contracts";
import { ensureSchema } from "../src/db";

export function createTestDb(): Database.Database {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  ensureSchema(db);
  return db;
}

export function makeNewsItem(overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    title: "Las hipotecas se encarecen por tercer mes",
    rawSummary: "El tipo medio subió hasta el 3,2% en septiembre. Los bancos endurecen la concesión.",
    category: "NOTICIAS_HIPOTECAS",
    source: "Expansión",
    url: "https://example.com/hipotecas",
    domain: "real_estate",
    publishedAt: new Date("2025-10-01T08:00:00.000Z"),
    tags: null,
    relevanceScore: null,
    ...overrides,
  };
}

export function makeDraft(overrides: Partial<Draft> = {}): Draft {
  return {
    brand: "althara",
    category: "NOTICIAS_HIPOTECAS",
    seed: 42,
    hook: "Señal de ajuste en el ciclo.",
    slides: [
      { title: "Hecho", body: "El tipo medio subió hasta el 3,2% en septiembre." },
      { title: "Contexto", body: "Contexto en el enlace." },
      { title: "Cierre", body: "Guárdalo." },
    ],
    caption: "Señal de ajuste en el ciclo.\n\nGuárdalo.\n\nFuente: Expansión",
    hashtags: ["#inmobiliaria", "#althara"],
    cta: "Guárdalo.",
    sourceLine: "Fuente: Expansión | https://example.com/hipotecas",
    disclaimer: "Contenido elaborado a partir de información publicada por Expansión.",
    tone: "neutral",
    language: "es",
    status: "DRAFT",
    ...overrides,
  };
}
