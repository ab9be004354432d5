import type { PipelineStore } from "../lib/pipeline-store.js";
import type { LlmGateway } from "../lib/llm-gateway.js";
import type { Script } from "../db/schema.js";
import { SCRIPT_MODEL, SCRIPT_SYSTEM_PROMPT, buildScriptPrompt } from "../prompts/script.js";
import { countWords, truncateWords } from "../utils/text.js";
import { formatIsoDate } from "../utils/dates.js";
import { hasTranscript } from "./transcript.js";
import {
  type StageProcessor,
  type StageStatus,
  type StageResult,
  missingProjectStatus,
  projectStatus,
  stageFailure,
  stageResult,
  errorMessage,
} from "./types.js";

export const MAX_WORDS_PER_TRANSCRIPT = 1500;
export const WORDS_PER_MINUTE = 150;

export function nextScriptVersion(existing: Pick<Script, "version">[]): number {
  return existing.reduce((max, s) => Math.max(max, s.version), 0) + 1;
}

export function estimateMinutes(wordCount: number): number {
  return Math.round((wordCount / WORDS_PER_MINUTE) * 10) / 10;
}

export interface ScriptSynthesisOptions {
  clock?: () => Date;
}

/**
 * Writes a new script version from every transcribed video in a project.
 * Earlier versions are never touched.
 */
export class ScriptSynthesisStage implements StageProcessor {
  readonly stage = "scriptSynthesis" as const;
  private readonly clock: () => Date;

  constructor(
    private readonly store: PipelineStore,
    private readonly llm: LlmGateway,
    options: ScriptSynthesisOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async getStatus(projectName: string): Promise<StageStatus> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) return missingProjectStatus(this.stage, projectName);

      const videos = await this.store.listProjectVideos(project.id);
      const withTranscripts = videos.filter(hasTranscript).length;
      const scripts = await this.store.listProjectScripts(project.id);

      // Every run makes a new version, so transcribed videos always count as pending input
      return projectStatus(this.stage, projectName, withTranscripts, 0, {
        totalVideos: videos.length,
        withTranscripts,
        existingScripts: scripts.length,
        latestVersion: scripts.length > 0 ? nextScriptVersion(scripts) - 1 : 0,
      });
    } catch (err) {
      console.error(`[Script] Status check failed for ${projectName}:`, errorMessage(err));
      return missingProjectStatus(this.stage, projectName, errorMessage(err));
    }
  }

  async processProject(projectName: string): Promise<StageResult> {
    try {
      const project = await this.store.findProjectByName(projectName);
      if (!project) {
        return stageFailure(this.stage, projectName, `Project '${projectName}' not found`);
      }

      const videos = (await this.store.listProjectVideos(project.id)).filter(hasTranscript);
      if (videos.length === 0) {
        return stageFailure(this.stage, projectName, "No videos with transcripts found in this project");
      }

      const topic = project.topic.trim() || project.name;
      console.log(`[Script] Writing script for ${projectName} from ${videos.length} video(s)`);

      const completion = await this.llm.complete({
        ...SCRIPT_MODEL,
        systemPrompt: SCRIPT_SYSTEM_PROMPT,
        userPrompt: buildScriptPrompt(
          topic,
          videos.map((v) => ({
            title: v.title,
            transcript: truncateWords(v.rawTranscript, MAX_WORDS_PER_TRANSCRIPT),
          }))
        ),
      });
      if (!completion.ok) {
        return stageFailure(this.stage, projectName, completion.error);
      }

      const content = completion.text.trim();
      if (!content) {
        return stageFailure(this.stage, projectName, "AI returned an empty script");
      }

      // Soft-deleted versions still hold their number
      const version = (await this.store.latestScriptVersion(project.id)) + 1;
      const title = `${project.name} - ${topic} Script v${version} (${formatIsoDate(this.clock())})`;

      const script = await this.store.createScript({
        projectId: project.id,
        title,
        content,
        version,
        promptTokens: completion.usage.promptTokens,
        completionTokens: completion.usage.completionTokens,
        totalTokens: completion.usage.totalTokens,
      });

      const wordCount = countWords(content);
      return stageResult(this.stage, projectName, [
        {
          id: script.id,
          title: script.title,
          success: true,
          message: `Created script version ${version}`,
          metrics: {
            version,
            wordCount,
            estimatedMinutes: estimateMinutes(wordCount),
            sourceVideos: videos.length,
            promptTokens: script.promptTokens,
            completionTokens: script.completionTokens,
            totalTokens: script.totalTokens,
          },
        },
      ]);
    } catch (err) {
      console.error(`[Script] Script creation failed for ${projectName}:`, errorMessage(err));
      return stageFailure(this.stage, projectName, `Script creation failed: ${errorMessage(err)}`);
    }
  }

  /** Newest version first; null when the project does not exist. */
  async listScripts(projectName: string): Promise<Script[] | null> {
    const project = await this.store.findProjectByName(projectName);
    if (!project) return null;
    return this.store.listProjectScripts(project.id);
  }
}
