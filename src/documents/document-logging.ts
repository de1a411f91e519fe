import { theme, spinner } from '../library/ui.js';
import { errorMessage } from '../library/errors.js';

export function logFileSkipped(filePath: string, error: unknown): void {
  spinner.clear();
  console.warn(
    `  ${theme.warn} ${theme.warning('Skipped')} ${filePath}${theme.separator}${theme.dim(errorMessage(error))}`
  );
}
