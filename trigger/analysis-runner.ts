import { getProfile } from "./profiles";
import type { AnalysisType } from "./types/domain";
import { generateAnalysis, type GenerationRequest } from "./utils/claude";
import { extractDocumentText } from "./utils/extractor";

export interface AnalysisRequest {
  analysisType: AnalysisType;
  filePath: string;
  query: string;
}

export interface AnalysisRunner {
  run(request: AnalysisRequest): Promise<string>;
}

export interface AnalysisRunnerOptions {
  extract?: (filePath: string) => Promise<string>;
  generate?: (request: GenerationRequest) => Promise<string>;
}

/**
 * Reads the document and hands it to the profile's generation backend.
 * Extraction never throws; generation may.
 */
export function createAnalysisRunner(
  options: AnalysisRunnerOptions = {}
): AnalysisRunner {
  const extract = options.extract ?? extractDocumentText;
  const generate = options.generate ?? generateAnalysis;

  return {
    async run(request) {
      const profile = getProfile(request.analysisType);
      const documentText = await extract(request.filePath);

      return generate({
        profile,
        documentText,
        query: request.query,
      });
    },
  };
}
