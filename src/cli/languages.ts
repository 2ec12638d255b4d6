import { Command } from 'commander';
import { SubtitleDbClient } from '../api/subtitle-db';
import { loadServiceConfig } from '../config';
import { handleError, toAppError } from '../errors/handler';
import { exitCodeFor } from '../errors/exit-codes';
import { SubtitleLanguage } from '../types/subtitles';

export function formatLanguages(languages: SubtitleLanguage[]): string[] {
  return languages.map((language) => `${language.id} - ${language.name}`);
}

/**
 * Create languages command
 * List the language codes accepted by --lang
 */
export function createLanguagesCommand(): Command {
  const languages = new Command('languages');

  languages
    .description('List the languages the subtitle database knows')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const { debug } = command.optsWithGlobals<{ debug?: boolean }>();
      try {
        const client = SubtitleDbClient.fromConfig(loadServiceConfig());
        for (const line of formatLanguages(await client.listLanguages())) {
          console.log(line);
        }
      } catch (error) {
        handleError(error, debug === true);
        process.exit(exitCodeFor(toAppError(error).code));
      }
    });

  return languages;
}
