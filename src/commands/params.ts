import { describeParameters } from '../assembler.js';
import { loadComposition, resolveSettings } from '../config.js';
import { formatParameterUsage, parameterUsageToJson, parseOutputFormat } from '../output-formatter.js';
import { Composition, OutputFormat } from '../types.js';
import { reportError } from './report-error.js';

/**
 * Parameter listing appended to `--help`
 */
export function renderParameterHelp(composition: Composition): string {
  return `\nComposition: ${composition.name}` +
    (composition.description ? ` - ${composition.description}` : '') +
    `\n\n${formatParameterUsage(describeParameters(composition.targets))}\n`;
}

/**
 * bringup params: list every declared parameter of a composition
 * @returns Process exit code
 */
export async function handleParamsCommand(options: {
  composition?: string;
  format?: string;
}): Promise<number> {
  try {
    const format = parseOutputFormat(options.format);
    const settings = resolveSettings(process.env, { composition: options.composition });
    const composition = await loadComposition(settings.composition, process.cwd());
    const usages = describeParameters(composition.targets);

    console.log(format === OutputFormat.Json ? parameterUsageToJson(usages) : formatParameterUsage(usages));
    return 0;
  } catch (error) {
    reportError('Failed to list parameters', error);
    return 1;
  }
}
