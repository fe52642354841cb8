import { extname } from "node:path";
import {
  DEFAULT_LANGUAGE_DETECTION_CONFIG,
  type LanguageDetectionConfig,
} from "../domain/quality-config.js";
import { streamProjectFiles } from "../infrastructure/file-system.js";

export type DetectLanguagesInput = {
  repositoryPath: string;
  config?: Partial<LanguageDetectionConfig>;
};

const sortLanguages = (languages: ReadonlySet<string>): readonly string[] =>
  [...languages].sort((a, b) => a.localeCompare(b));

export const detectLanguages = async (input: DetectLanguagesInput): Promise<readonly string[]> => {
  const config: LanguageDetectionConfig = { ...DEFAULT_LANGUAGE_DETECTION_CONFIG, ...input.config };
  const languages = new Set<string>();
  if (config.maxLanguages <= 0) {
    return [];
  }

  try {
    for await (const entry of streamProjectFiles(input.repositoryPath, { ignore: config.searchIgnore })) {
      const language = config.extensions[extname(String(entry))];
      if (language === undefined) {
        continue;
      }

      languages.add(language);
      if (languages.size >= config.maxLanguages) {
        break;
      }
    }
  } catch {
    // An unreadable subtree ends the walk; what was found so far stands.
    return sortLanguages(languages);
  }

  return sortLanguages(languages);
};
