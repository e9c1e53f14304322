import type { AgentDescriptor, Runtime, Topic } from "@switchboard/types";
import { TRIAGE_TOPIC } from "@switchboard/types";
import { ModelTaskHandler, type ModelAdapter } from "@switchboard/runtime";
import {
  documentTools,
  escalateToHuman,
  knowledgeTools,
  projectDataTools,
  projectTools,
  transferBackToTriage,
  transferTo,
  type DocumentStore,
  type KnowledgeBase,
} from "@switchboard/tools";

export const PLANNING_TOPIC: Topic = "planning";
export const USER_STORIES_TOPIC: Topic = "user_stories";
export const QUALITY_TOPIC: Topic = "quality";
export const EXECUTION_TOPIC: Topic = "execution";
export const USER_PROFILER_TOPIC: Topic = "user_profiler";

export interface AgentFactoryOptions {
  model: ModelAdapter;
  documents: DocumentStore;
  /** Project entities the planning agent reads and edits. */
  knowledge: KnowledgeBase;
  /** Model calls per task, passed to every ModelTaskHandler. */
  maxIterations?: number;
}

const TRIAGE_INSTRUCTIONS = `Your role is to understand the user's request and route it to the right specialist.
- Planning: project plans and requirements gathering.
- User stories: user stories with EARS acceptance criteria.
- Quality: quality assurance and project reviews.
- Execution: running project tasks.
- User profiler: learning about the user (role, experience, skills) so the others can pitch their questions right.
Use the transfer tools to delegate. Escalate to a human only when the user asks for one or no specialist fits.
Be helpful and professional.`;

const PLANNING_INSTRUCTIONS = `Your role is to help the user plan a project.
Ask clarifying questions until you know the project name and its requirements, then call create_project_plan and summarize the plan.
Check the knowledge base (get_full_project_context, query_entities) before asking for facts it may already hold, and record epics, risks and milestones with create_entity or update_entity.
Use retrieve_project_data to read a saved user profile and adjust your tone to it.
If the user asks for something that is not planning, transfer back to triage.`;

const USER_STORIES_INSTRUCTIONS = `Your role is to turn high-level requirements into user stories.
Write each story as "As a <role>, I want <goal> so that <benefit>" with acceptance criteria in EARS notation (WHEN/WHILE/IF ... THE SYSTEM SHALL ...).
Cover edge cases and error handling. Save finished stories with save_document when the user asks to keep them.
If the user asks for something else, transfer back to triage.`;

const QUALITY_INSTRUCTIONS = `Your role is to review project quality and run quality assessments.
Use review_project_quality for reviews and read_document to inspect saved plans.
If the user asks for something else, transfer back to triage.`;

const EXECUTION_INSTRUCTIONS = `Your role is to execute project tasks.
Confirm the task name and its priority (low, medium or high) before calling execute_project_task.
If the user asks for something else, transfer back to triage.`;

const USER_PROFILER_INSTRUCTIONS = `Your role is to understand the user's capabilities and knowledge so the other agents can tune their tone and questions.
Ask one question at a time, in this order: the user's role on the project, their experience with similar projects, their skills, and what they expect from the assistant.
If a profile was saved before, read it with retrieve_project_data and only ask about what is missing.
When the profile is complete, summarize it and ask whether to save it. Save it with save_project_data if the user agrees, then transfer back to triage.`;

/**
 * The project-assistant agent set: a triage entry point and five
 * specialists, all driven by the same model adapter.
 */
export function createAgents(options: AgentFactoryOptions): AgentDescriptor[] {
  const { model, documents, knowledge, maxIterations } = options;
  const project = projectTools({ documents });
  const projectData = projectDataTools(documents);
  const docs = documentTools(documents);
  const handler = (instructions: string) =>
    new ModelTaskHandler({ model, instructions, maxIterations });

  return [
    {
      topic: TRIAGE_TOPIC,
      description: "Understands the request and routes it to a specialist.",
      tools: [
        transferTo(PLANNING_TOPIC, "Transfer to the planning agent for project plans and requirements."),
        transferTo(USER_STORIES_TOPIC, "Transfer to the user stories agent for user stories and acceptance criteria."),
        transferTo(QUALITY_TOPIC, "Transfer to the quality agent for quality reviews."),
        transferTo(EXECUTION_TOPIC, "Transfer to the execution agent to run project tasks."),
        transferTo(USER_PROFILER_TOPIC, "Transfer to the user profiler to learn about the user's background."),
        escalateToHuman,
        project.createUuid,
      ],
      handler: handler(TRIAGE_INSTRUCTIONS),
    },
    {
      topic: PLANNING_TOPIC,
      description: "Gathers requirements and creates project plans.",
      tools: [
        project.createProjectPlan,
        ...docs,
        ...knowledgeTools(knowledge),
        projectData.retrieveProjectData,
        projectData.saveProjectData,
        transferBackToTriage,
      ],
      handler: handler(PLANNING_INSTRUCTIONS),
    },
    {
      topic: USER_STORIES_TOPIC,
      description: "Writes user stories with EARS acceptance criteria.",
      tools: [...docs, transferBackToTriage],
      handler: handler(USER_STORIES_INSTRUCTIONS),
    },
    {
      topic: QUALITY_TOPIC,
      description: "Reviews project quality.",
      tools: [project.reviewProjectQuality, ...docs, transferBackToTriage],
      handler: handler(QUALITY_INSTRUCTIONS),
    },
    {
      topic: EXECUTION_TOPIC,
      description: "Executes project tasks.",
      tools: [project.executeProjectTask, transferBackToTriage],
      handler: handler(EXECUTION_INSTRUCTIONS),
    },
    {
      topic: USER_PROFILER_TOPIC,
      description: "Profiles the user's role, experience and expectations.",
      tools: [projectData.retrieveProjectData, projectData.saveProjectData, transferBackToTriage],
      handler: handler(USER_PROFILER_INSTRUCTIONS),
    },
  ];
}

export function registerAgents(runtime: Pick<Runtime, "subscribe">, agents: readonly AgentDescriptor[]): void {
  for (const agent of agents) {
    runtime.subscribe(agent.topic, agent);
  }
}
