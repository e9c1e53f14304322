import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { isDeepStrictEqual } from "node:util";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ToolSpec } from "@switchboard/types";
import { defineTool } from "./define-tool.js";

export const EntityTypeSchema = z
  .enum([
    "Project",
    "Epic",
    "UserStory",
    "Issue",
    "Risk",
    "Milestone",
    "Deliverable",
    "Team",
    "Person",
    "Stakeholder",
    "Requirement",
    "Backlog",
    "Sprint",
    "ChangeRequest",
    "Baseline",
    "TestCase",
    "Phase",
    "WorkStream",
    "Documentation",
    "Repository",
    "Metric",
    "CommunicationPlan",
    "AIWorkProduct",
    "Scope",
  ])
  .describe("Kind of project entity");

export type EntityType = z.infer<typeof EntityTypeSchema>;

export const ENTITY_TYPES: Readonly<Record<EntityType, string>> = {
  Project: "Root entity representing the entire software project",
  Epic: "Large work body capturing major capability with traceability to business objectives",
  UserStory: "End-user perspective feature description with acceptance criteria",
  Issue: "Technical task or problem resolution item",
  Risk: "Project risk following PMI risk management framework",
  Milestone: "Significant point in project timeline with deliverable tracking",
  Deliverable: "Tangible or intangible product produced as part of project completion",
  Team: "Cross-functional team responsible for project delivery",
  Person: "Human individual involved in the project environment",
  Stakeholder: "Project stakeholder with influence and interest assessment",
  Requirement: "Single discrete requirement with unique identifier and traceability",
  Backlog: "Ordered list of work items awaiting execution",
  Sprint: "Time-boxed iteration typically 1-4 weeks in duration",
  ChangeRequest: "Formal request to modify project baselines",
  Baseline: "Approved version of scope, schedule, or cost used for comparison",
  TestCase: "Verifiable condition for requirement validation",
  Phase: "Distinct time period in predictive project lifecycles",
  WorkStream: "Parallel work track focusing on specific project aspect",
  Documentation: "Project artifact serving various stakeholder needs",
  Repository: "Storage location for project artifacts and code",
  Metric: "Quantitative measure of project performance or quality",
  CommunicationPlan: "Structured approach to project information distribution",
  AIWorkProduct: "AI-generated artifacts and their provenance information",
  Scope: "Project scope definition with inclusions, exclusions, and constraints",
};

/** Ids double as file names, so they are limited to a safe alphabet. */
export const EntityIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "Entity ids may only contain letters, digits, '-' and '_'")
  .describe("Id of the entity");

const EntitySchema = z.object({ id: z.string() }).passthrough();

export type Entity = z.infer<typeof EntitySchema>;

interface Relation {
  /** Field holding the referenced id (or ids, when `many`). */
  readonly field: string;
  readonly type: EntityType;
  readonly many: boolean;
  /** Field the loaded entity is written to. Defaults to `field`. */
  readonly as?: string;
}

const RELATIONS: Partial<Record<EntityType, readonly Relation[]>> = {
  Project: [
    { field: "epics", type: "Epic", many: true },
    { field: "team", type: "Team", many: false },
    { field: "risks", type: "Risk", many: true },
    { field: "milestones", type: "Milestone", many: true },
    { field: "stakeholders", type: "Stakeholder", many: true },
    { field: "scope", type: "Scope", many: false },
  ],
  Epic: [{ field: "user_stories", type: "UserStory", many: true }],
  UserStory: [{ field: "epic_id", type: "Epic", many: false, as: "epic" }],
  Team: [{ field: "members", type: "Person", many: true }],
};

/**
 * Project entities stored as JSON files, one per entity, under
 * `<root>/<type in lower case>/<id>.json`.
 */
export class KnowledgeBase {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  entityTypes(): Readonly<Record<EntityType, string>> {
    return ENTITY_TYPES;
  }

  async get(type: EntityType, id: string): Promise<Entity | undefined> {
    const file = this.fileFor(type, id);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    return this.decode(type, id, raw);
  }

  /** The entity with its directly referenced entities loaded in place. */
  getWithRelationships(type: EntityType, id: string): Promise<Entity | undefined> {
    return this.load(type, id, 1);
  }

  /** A project with its epics (and their user stories), team, risks and the rest loaded. */
  projectContext(projectId: string): Promise<Entity | undefined> {
    return this.load("Project", projectId, 2);
  }

  /** Stores a new entity under a generated id. Any id in `data` is replaced. */
  async create(type: EntityType, data: Record<string, unknown>): Promise<Entity> {
    const now = new Date().toISOString();
    const entity: Entity = { ...data, id: uuidv4(), created_date: now, last_updated: now };
    await this.write(type, entity);
    return entity;
  }

  async update(type: EntityType, id: string, data: Record<string, unknown>): Promise<Entity | undefined> {
    const existing = await this.get(type, id);
    if (!existing) return undefined;
    const entity: Entity = {
      ...existing,
      ...data,
      id,
      created_date: existing.created_date,
      last_updated: new Date().toISOString(),
    };
    await this.write(type, entity);
    return entity;
  }

  /** Returns false when there was nothing to delete. */
  async delete(type: EntityType, id: string): Promise<boolean> {
    try {
      await fs.unlink(this.fileFor(type, id));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /** Entities of one type whose fields equal every filter value. */
  async query(type: EntityType, filters: Record<string, unknown> = {}): Promise<Entity[]> {
    const dir = this.dirFor(type);
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const matches: Entity[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(".json")) continue;
      const id = entry.name.slice(0, -".json".length);
      const entity = this.decode(type, id, await fs.readFile(path.join(dir, entry.name), "utf8"));
      if (Object.entries(filters).every(([key, value]) => isDeepStrictEqual(entity[key], value))) {
        matches.push(entity);
      }
    }
    return matches.sort((a, b) => a.id.localeCompare(b.id));
  }

  private async load(type: EntityType, id: string, depth: number): Promise<Entity | undefined> {
    const entity = await this.get(type, id);
    if (!entity || depth === 0) return entity;
    const expanded: Entity = { ...entity };
    for (const relation of RELATIONS[type] ?? []) {
      const value = entity[relation.field];
      const target = relation.as ?? relation.field;
      if (relation.many && Array.isArray(value)) {
        const loaded: Entity[] = [];
        for (const ref of value) {
          const related = typeof ref === "string" ? await this.safeLoad(relation.type, ref, depth - 1) : undefined;
          if (related) loaded.push(related);
        }
        expanded[target] = loaded;
      } else if (!relation.many && typeof value === "string") {
        const related = await this.safeLoad(relation.type, value, depth - 1);
        if (related) expanded[target] = related;
      }
    }
    return expanded;
  }

  /** References with ids outside the id alphabet resolve to nothing. */
  private safeLoad(type: EntityType, id: string, depth: number): Promise<Entity | undefined> {
    if (!EntityIdSchema.safeParse(id).success) return Promise.resolve(undefined);
    return this.load(type, id, depth);
  }

  private async write(type: EntityType, entity: Entity): Promise<void> {
    const file = this.fileFor(type, entity.id);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(entity, null, 2), "utf8");
  }

  private decode(type: EntityType, id: string, raw: string): Entity {
    try {
      return EntitySchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new Error(`Stored ${type} ${id} is not a valid entity`, { cause: err });
    }
  }

  private dirFor(type: EntityType): string {
    return path.join(this.root, type.toLowerCase());
  }

  private fileFor(type: EntityType, id: string): string {
    return path.join(this.dirFor(type), `${EntityIdSchema.parse(id)}.json`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

const EntityRefSchema = z.object({
  entity_type: EntityTypeSchema,
  entity_id: EntityIdSchema,
});

const EntityDataSchema = z.record(z.unknown()).describe("Entity fields as a JSON object");

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function notFound(type: EntityType, id: string): string {
  return json({ error: `${type} ${id} not found` });
}

/** Tools for reading and editing the project knowledge base. Results are JSON strings. */
export function knowledgeTools(kb: KnowledgeBase): ToolSpec[] {
  return [
    defineTool({
      name: "get_full_project_context",
      description:
        "Get the full context of a project including all related entities (epics, team, risks, milestones, etc.). Returns JSON string.",
      argumentSchema: z.object({ project_id: EntityIdSchema }),
      handler: async ({ project_id }) => {
        const project = await kb.projectContext(project_id);
        return project ? json(project) : notFound("Project", project_id);
      },
    }),
    defineTool({
      name: "get_entity_by_id",
      description: "Get a specific entity by ID without loading relationships. Returns JSON string.",
      argumentSchema: EntityRefSchema,
      handler: async ({ entity_type, entity_id }) => {
        const entity = await kb.get(entity_type, entity_id);
        return entity ? json(entity) : notFound(entity_type, entity_id);
      },
    }),
    defineTool({
      name: "get_entity_with_relationships",
      description: "Get a specific entity by ID with all its relationships loaded. Returns JSON string.",
      argumentSchema: EntityRefSchema,
      handler: async ({ entity_type, entity_id }) => {
        const entity = await kb.getWithRelationships(entity_type, entity_id);
        return entity ? json(entity) : notFound(entity_type, entity_id);
      },
    }),
    defineTool({
      name: "create_entity",
      description:
        "Create a new entity without providing an ID. The system will generate a UUID and return it in the result.",
      argumentSchema: z.object({ entity_type: EntityTypeSchema, data: EntityDataSchema }),
      handler: async ({ entity_type, data }) => {
        const entity = await kb.create(entity_type, data);
        return json({
          success: true,
          entity_id: entity.id,
          entity_type,
          message: `${entity_type} created successfully`,
        });
      },
    }),
    defineTool({
      name: "update_entity",
      description: "Update an existing entity by ID. Only the given fields change.",
      argumentSchema: EntityRefSchema.extend({ data: EntityDataSchema }),
      handler: async ({ entity_type, entity_id, data }) => {
        const entity = await kb.update(entity_type, entity_id, data);
        if (!entity) return notFound(entity_type, entity_id);
        return json({
          success: true,
          entity_id,
          entity_type,
          message: `${entity_type} updated successfully`,
        });
      },
    }),
    defineTool({
      name: "delete_entity",
      description: "Delete an entity by ID.",
      argumentSchema: EntityRefSchema,
      handler: async ({ entity_type, entity_id }) => {
        if (!(await kb.delete(entity_type, entity_id))) return notFound(entity_type, entity_id);
        return json({
          success: true,
          entity_id,
          entity_type,
          message: `${entity_type} deleted successfully`,
        });
      },
    }),
    defineTool({
      name: "query_entities",
      description: "Query entities of a specific type with optional filters on field values. Returns JSON string.",
      argumentSchema: z.object({
        entity_type: EntityTypeSchema,
        filters: EntityDataSchema.optional(),
      }),
      handler: async ({ entity_type, filters }) => json(await kb.query(entity_type, filters)),
    }),
    defineTool({
      name: "get_entity_types",
      description: "Get the list of entity types with a short description of each.",
      argumentSchema: z.object({}),
      handler: async () => json(kb.entityTypes()),
    }),
  ];
}
