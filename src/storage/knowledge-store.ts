import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
    Concept,
    KnowledgeConfig,
    KnowledgeStats,
    PaperInput,
    RelatedConcept,
    RelationshipType,
    SimilarPaper,
    StoredPaper,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { InvalidArgumentError, RecordNotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * A paper/concept graph: two node tables and one typed edge table.
 */
const MIGRATION_V1 = `
-- Papers: stored copies of search results
CREATE TABLE IF NOT EXISTS paper (
  id INTEGER PRIMARY KEY,
  paper_id TEXT NOT NULL,
  title TEXT NOT NULL,
  authors_json TEXT NOT NULL DEFAULT '[]',
  abstract TEXT NOT NULL DEFAULT '',
  doi TEXT NOT NULL DEFAULT '',
  published_date TEXT,
  source TEXT NOT NULL DEFAULT '',
  url TEXT NOT NULL DEFAULT '',
  pdf_url TEXT NOT NULL DEFAULT '',
  categories_json TEXT NOT NULL DEFAULT '[]',
  keywords_json TEXT NOT NULL DEFAULT '[]',
  extra_json TEXT NOT NULL DEFAULT '{}',
  stored_at TEXT NOT NULL
);

-- Concepts: knowledge extracted from papers
CREATE TABLE IF NOT EXISTS concept (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  category TEXT NOT NULL DEFAULT 'general',
  frequency INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);

-- relates_to: paper (in) -> concept (out) edges
CREATE TABLE IF NOT EXISTS relates_to (
  id INTEGER PRIMARY KEY,
  "in" INTEGER NOT NULL REFERENCES paper(id),
  "out" INTEGER NOT NULL REFERENCES concept(id),
  relationship_type TEXT NOT NULL,
  strength REAL NOT NULL DEFAULT 1.0,
  created_at TEXT NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS paper_id_idx ON paper(paper_id);
CREATE UNIQUE INDEX IF NOT EXISTS concept_name_idx ON concept(name);
CREATE INDEX IF NOT EXISTS relates_to_in_idx ON relates_to("in");
CREATE INDEX IF NOT EXISTS relates_to_out_idx ON relates_to("out");
CREATE INDEX IF NOT EXISTS paper_stored_at_idx ON paper(stored_at);
`;

const MEMORY_URL = ':memory:';

/**
 * Validates paper-shaped input and fills defaults for absent fields.
 */
const PaperInputSchema = z.object({
    paper_id: z.string().min(1),
    title: z.string(),
    authors: z.array(z.string()).default([]),
    abstract: z.string().default(''),
    doi: z.string().default(''),
    published_date: z.union([z.date(), z.string()]).nullish(),
    source: z.string().default(''),
    url: z.string().default(''),
    pdf_url: z.string().default(''),
    categories: z.array(z.string()).default([]),
    keywords: z.array(z.string()).default([]),
    extra: z.record(z.unknown()).default({}),
});

interface PaperRow {
    id: number;
    paper_id: string;
    title: string;
    authors_json: string;
    abstract: string;
    doi: string;
    published_date: string | null;
    source: string;
    url: string;
    pdf_url: string;
    categories_json: string;
    keywords_json: string;
    extra_json: string;
    stored_at: string;
}

interface RelatedConceptRow extends Concept {
    relationship_type: RelationshipType;
    strength: number;
}

export type KnowledgeStoreOptions = Partial<KnowledgeConfig>;

/**
 * Knowledge graph of papers, concepts and paper→concept relationships,
 * stored with better-sqlite3.
 *
 * Every operation awaits one shared connection promise, so concurrent
 * callers never open the database twice. Backend errors propagate.
 */
export class KnowledgeStore {
    readonly location: string;
    private connection: Promise<Database.Database> | null = null;

    constructor(options: KnowledgeStoreOptions = {}) {
        const url = options.url ?? process.env['KNOWLEDGE_DB_URL'] ?? DEFAULT_CONFIG.knowledge.url;
        const namespace = options.namespace ?? process.env['KNOWLEDGE_DB_NS'] ?? DEFAULT_CONFIG.knowledge.namespace;
        const database = options.database ?? process.env['KNOWLEDGE_DB_NAME'] ?? DEFAULT_CONFIG.knowledge.database;

        this.location = url === MEMORY_URL ? MEMORY_URL : join(url, namespace, `${database}.db`);
    }

    /**
     * Open the database and provision the schema. Safe to call repeatedly
     * and concurrently; a failed open is not cached.
     */
    async connect(): Promise<void> {
        await this.handle();
    }

    get isConnected(): boolean {
        return this.connection !== null;
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * Store a timestamped copy of a paper.
     * A `paper_id` that is already stored violates the unique index and throws.
     * @returns The new record id, or null if nothing was inserted
     */
    async storePaper(data: PaperInput): Promise<number | null> {
        const db = await this.handle();
        const paper = PaperInputSchema.parse(data);

        const result = db.prepare(`
      INSERT INTO paper (paper_id, title, authors_json, abstract, doi, published_date, source, url, pdf_url, categories_json, keywords_json, extra_json, stored_at)
      VALUES (@paper_id, @title, @authors_json, @abstract, @doi, @published_date, @source, @url, @pdf_url, @categories_json, @keywords_json, @extra_json, @stored_at)
    `).run({
            paper_id: paper.paper_id,
            title: paper.title,
            authors_json: JSON.stringify(paper.authors),
            abstract: paper.abstract,
            doi: paper.doi,
            published_date: toIsoDate(paper.published_date),
            source: paper.source,
            url: paper.url,
            pdf_url: paper.pdf_url,
            categories_json: JSON.stringify(paper.categories),
            keywords_json: JSON.stringify(paper.keywords),
            extra_json: JSON.stringify(paper.extra),
            stored_at: new Date().toISOString(),
        });

        return result.changes > 0 ? Number(result.lastInsertRowid) : null;
    }

    /**
     * Look a paper up by its external `paper_id`.
     */
    async getPaper(paperId: string): Promise<StoredPaper | null> {
        const db = await this.handle();
        const row = db.prepare('SELECT * FROM paper WHERE paper_id = ? LIMIT 1').get(paperId) as PaperRow | undefined;
        return row ? toStoredPaper(row) : null;
    }

    /**
     * Case-sensitive substring match over title and abstract, newest first.
     */
    async searchPapers(query: string, limit = 10): Promise<StoredPaper[]> {
        assertLimit(limit);
        const db = await this.handle();

        const rows = db.prepare(`
      SELECT * FROM paper
      WHERE instr(title, @query) > 0 OR instr(abstract, @query) > 0
      ORDER BY stored_at DESC, id DESC
      LIMIT @limit
    `).all({ query, limit }) as PaperRow[];

        return rows.map(toStoredPaper);
    }

    // ─── Concepts ─────────────────────────────────────────────

    /**
     * Create a concept, or bump the frequency of an existing one with the same name.
     * @returns The concept's record id
     */
    async addConcept(name: string, description = '', category = 'general'): Promise<number> {
        if (name.trim().length === 0) {
            throw new InvalidArgumentError('name', 'concept name must be non-empty');
        }
        const db = await this.handle();
        return upsertConcept(db, name, description, category);
    }

    async getConcept(name: string): Promise<Concept | null> {
        const db = await this.handle();
        const row = db.prepare('SELECT * FROM concept WHERE name = ?').get(name) as Concept | undefined;
        return row ?? null;
    }

    // ─── Relationships ────────────────────────────────────────

    /**
     * Add a paper→concept edge. Repeated calls add repeated edges.
     * An unknown concept is created first.
     * @param paperRecordId - Record id returned by `storePaper`
     * @param strength - 0.0 to 1.0
     * @returns The edge's record id
     */
    async relatePaperToConcept(
        paperRecordId: number,
        conceptName: string,
        strength = 1.0,
        relationshipType: RelationshipType = 'discusses'
    ): Promise<number> {
        if (!Number.isFinite(strength) || strength < 0 || strength > 1) {
            throw new InvalidArgumentError('strength', `must be between 0 and 1, got ${strength}`);
        }
        if (conceptName.trim().length === 0) {
            throw new InvalidArgumentError('conceptName', 'concept name must be non-empty');
        }

        const db = await this.handle();

        const relate = db.transaction(() => {
            const paper = db.prepare('SELECT id FROM paper WHERE id = ?').get(paperRecordId);
            if (paper === undefined) {
                throw new RecordNotFoundError('paper', paperRecordId);
            }

            const existing = db.prepare('SELECT id FROM concept WHERE name = ?').get(conceptName) as { id: number } | undefined;
            const conceptId = existing?.id ?? upsertConcept(db, conceptName, '', 'general');

            const result = db.prepare(`
        INSERT INTO relates_to ("in", "out", relationship_type, strength, created_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(paperRecordId, conceptId, relationshipType, strength, new Date().toISOString());

            return Number(result.lastInsertRowid);
        });

        return relate();
    }

    /**
     * Concepts a paper points at, each paired with its edge, strongest first.
     */
    async getRelatedConcepts(paperRecordId: number): Promise<RelatedConcept[]> {
        const db = await this.handle();

        const rows = db.prepare(`
      SELECT c.id, c.name, c.description, c.category, c.frequency, c.created_at,
             r.relationship_type, r.strength
      FROM relates_to r
      JOIN concept c ON c.id = r."out"
      WHERE r."in" = ?
      ORDER BY r.strength DESC, r.id ASC
    `).all(paperRecordId) as RelatedConceptRow[];

        return rows.map(({ relationship_type, strength, ...concept }) => ({
            concept,
            relationship_type,
            strength,
        }));
    }

    /**
     * Papers reachable through paper → concept → paper, ranked by the number
     * of distinct shared concepts. Never includes the origin paper.
     */
    async getSimilarPapers(paperRecordId: number, limit = 5): Promise<SimilarPaper[]> {
        assertLimit(limit);
        const db = await this.handle();

        return db.prepare(`
      SELECT p.id, p.paper_id, p.title, COUNT(DISTINCT theirs."out") AS shared_concepts
      FROM relates_to mine
      JOIN relates_to theirs ON theirs."out" = mine."out"
      JOIN paper p ON p.id = theirs."in"
      WHERE mine."in" = @origin AND theirs."in" != @origin
      GROUP BY p.id, p.paper_id, p.title
      ORDER BY shared_concepts DESC, p.id ASC
      LIMIT @limit
    `).all({ origin: paperRecordId, limit }) as SimilarPaper[];
    }

    // ─── Stats ────────────────────────────────────────────────

    async getKnowledgeStats(): Promise<KnowledgeStats> {
        const db = await this.handle();
        const count = (table: string): number =>
            (db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

        return {
            papers: count('paper'),
            concepts: count('concept'),
            relationships: count('relates_to'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection. A no-op when not connected.
     */
    async close(): Promise<void> {
        const pending = this.connection;
        if (!pending) return;

        this.connection = null;
        // An open that failed has nothing to close
        const db = await pending.catch(() => null);
        if (!db) return;
        db.close();
        getLogger().debug({ location: this.location }, 'Knowledge store closed');
    }

    private handle(): Promise<Database.Database> {
        if (!this.connection) {
            this.connection = Promise.resolve()
                .then(() => this.open())
                .catch((error: unknown) => {
                    this.connection = null;
                    throw error;
                });
        }
        return this.connection;
    }

    private open(): Database.Database {
        if (this.location !== MEMORY_URL) {
            mkdirSync(dirname(this.location), { recursive: true });
        }

        const db = new Database(this.location);
        db.pragma('journal_mode = WAL');
        db.pragma('foreign_keys = ON');
        migrate(db);

        getLogger().debug({ location: this.location }, 'Knowledge store connected');
        return db;
    }
}

/**
 * Run schema migrations.
 */
function migrate(db: Database.Database): void {
    const currentVersion = db.pragma('user_version', { simple: true });

    if (typeof currentVersion !== 'number' || currentVersion < 1) {
        db.exec(MIGRATION_V1);
        db.pragma('user_version = 1');
        getLogger().info('Knowledge store migrated to v1');
    }
}

function upsertConcept(db: Database.Database, name: string, description: string, category: string): number {
    const upsert = db.transaction(() => {
        const existing = db.prepare('SELECT id FROM concept WHERE name = ?').get(name) as { id: number } | undefined;
        if (existing) {
            db.prepare('UPDATE concept SET frequency = frequency + 1 WHERE id = ?').run(existing.id);
            return existing.id;
        }

        const result = db.prepare(`
      INSERT INTO concept (name, description, category, frequency, created_at)
      VALUES (?, ?, ?, 1, ?)
    `).run(name, description, category, new Date().toISOString());
        return Number(result.lastInsertRowid);
    });

    return upsert();
}

function toStoredPaper(row: PaperRow): StoredPaper {
    return {
        id: row.id,
        paper_id: row.paper_id,
        title: row.title,
        authors: parseStringArray(row.authors_json),
        abstract: row.abstract,
        doi: row.doi,
        published_date: row.published_date,
        source: row.source,
        url: row.url,
        pdf_url: row.pdf_url,
        categories: parseStringArray(row.categories_json),
        keywords: parseStringArray(row.keywords_json),
        extra: z.record(z.unknown()).parse(JSON.parse(row.extra_json)),
        stored_at: row.stored_at,
    };
}

function parseStringArray(json: string): string[] {
    return z.array(z.string()).parse(JSON.parse(json));
}

function toIsoDate(value: Date | string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) return isNaN(value.getTime()) ? null : value.toISOString();
    return value;
}

function assertLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 0) {
        throw new InvalidArgumentError('limit', `must be a non-negative integer, got ${limit}`);
    }
}
