import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { ToolSpec } from "@switchboard/types";
import { defineTool } from "./define-tool.js";
import { DocumentNotFoundError, type DocumentStore } from "./documents.js";

export const CreateProjectPlanSchema = z.object({
  project_name: z.string().min(1).describe("The name of the project to be planned"),
  requirements: z.string().min(1).describe("The requirements or specifications for the project"),
});

export const ExecuteProjectTaskSchema = z.object({
  task_name: z.string().min(1).describe("The name of the task to be executed"),
  priority: z.enum(["low", "medium", "high"]).describe("The priority level of the task"),
});

export const ReviewProjectQualitySchema = z.object({
  project_id: z.string().min(1).describe("The identifier of the project to be reviewed"),
});

export const SaveProjectDataSchema = z.object({
  project: z
    .object({ name: z.string().min(1).describe("Project name, used as the storage key") })
    .passthrough()
    .describe("Project data to store, for example the user's profile answers"),
});

export const RetrieveProjectDataSchema = z.object({
  project_name: z.string().min(1).describe("Name the project data was saved under"),
});

/** Turns a project name into a file-system friendly slug. */
export function safeProjectName(name: string): string {
  return name.trim().replace(/[^a-zA-Z0-9_\-.]/g, "_");
}

export function renderPlan(projectName: string, requirements: string): string {
  return [
    `# Project Plan - ${projectName}`,
    "",
    "## Requirements",
    requirements,
    "",
    "## Next steps",
    "- Break the requirements into user stories",
    "- Review the plan for quality",
    "- Schedule execution tasks",
    "",
  ].join("\n");
}

export interface ProjectToolOptions {
  /** Where created plans are written. Plans are not saved without one. */
  documents?: DocumentStore;
}

export function projectTools(options: ProjectToolOptions = {}): Record<
  "createProjectPlan" | "executeProjectTask" | "reviewProjectQuality" | "createUuid",
  ToolSpec
> {
  const { documents } = options;

  return {
    createProjectPlan: defineTool({
      name: "create_project_plan",
      description: "Create a project plan with the given name and requirements.",
      argumentSchema: CreateProjectPlanSchema,
      handler: async ({ project_name, requirements }) => {
        let summary = `Project plan created for ${project_name} with requirements: ${requirements}`;
        if (documents) {
          const name = `plans/${safeProjectName(project_name)}.md`;
          await documents.save({ name, content: renderPlan(project_name, requirements) });
          summary += ` (saved as ${name})`;
        }
        return summary;
      },
    }),
    executeProjectTask: defineTool({
      name: "execute_project_task",
      description: "Execute a project task with the given name and priority.",
      argumentSchema: ExecuteProjectTaskSchema,
      handler: async ({ task_name, priority }) =>
        `Task '${task_name}' with priority '${priority}' has been executed.`,
    }),
    reviewProjectQuality: defineTool({
      name: "review_project_quality",
      description: "Review the quality of a project.",
      argumentSchema: ReviewProjectQualitySchema,
      handler: async ({ project_id }) => `Quality review completed for project ${project_id}`,
    }),
    createUuid: defineTool({
      name: "create_uuid",
      description: "Only call this if explicitly asked to create a uuid.",
      argumentSchema: z.object({}),
      handler: async () => uuidv4(),
    }),
  };
}

/** Save and retrieve free-form project data as JSON under `projects/` in the document store. */
export function projectDataTools(
  documents: DocumentStore,
): Record<"saveProjectData" | "retrieveProjectData", ToolSpec> {
  const fileFor = (name: string) => `projects/${safeProjectName(name)}.json`;

  return {
    saveProjectData: defineTool({
      name: "save_project_data",
      description: "Save project data (such as a user profile) so it can be retrieved later.",
      argumentSchema: SaveProjectDataSchema,
      handler: async ({ project }) => {
        await documents.save({ name: fileFor(project.name), content: JSON.stringify(project, null, 2) });
        return `Project data saved for ${project.name}`;
      },
    }),
    retrieveProjectData: defineTool({
      name: "retrieve_project_data",
      description: "Retrieve project data previously saved under the given project name.",
      argumentSchema: RetrieveProjectDataSchema,
      handler: async ({ project_name }) => {
        try {
          return await documents.read({ name: fileFor(project_name) });
        } catch (err) {
          if (err instanceof DocumentNotFoundError) return `No project data saved for ${project_name}.`;
          throw err;
        }
      },
    }),
  };
}
