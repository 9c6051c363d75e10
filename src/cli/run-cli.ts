import { config } from '../config';
import { partnershipTaxService } from '../services/partnership-tax.service';
import { reportFormatterService } from '../services/report-formatter.service';
import { taxRulesService } from '../services/tax-rules.service';
import { describeError, isUserFacingError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CliDefaults, parseCliArgs, USAGE } from './args';

export interface OutputStreams {
    stdout(text: string): void;
    stderr(text: string): void;
}

export const consoleStreams: OutputStreams = {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`)
};

export const EXIT_OK = 0;
export const EXIT_INVALID_INPUT = 1;

/**
 * One-shot calculation from flags. Nothing is stored.
 *
 * @returns the process exit code; unexpected errors are rethrown
 */
export function runCli(
    argv: readonly string[],
    streams: OutputStreams = consoleStreams,
    defaults: CliDefaults = { vatRate: config.tax.defaultVatRate, fiscalYear: config.tax.fiscalYear }
): number {
    try {
        const command = parseCliArgs(argv, defaults);
        if (command.kind === 'help') {
            streams.stdout(USAGE);
            return EXIT_OK;
        }

        const rules = taxRulesService.get(command.fiscalYear);
        const result = partnershipTaxService.calculate({ ...command.figures, partners: command.partners }, rules);
        logger.debug('[CLI] Calculation complete', { fiscalYear: result.fiscalYear, partners: result.perPartner.length });

        streams.stdout(command.json
            ? reportFormatterService.formatTaxResultJson(result)
            : reportFormatterService.formatTaxReport(result));
        return EXIT_OK;
    } catch (error) {
        if (isUserFacingError(error)) {
            streams.stderr(`Error: ${describeError(error)}`);
            streams.stderr('Run with --help for usage.');
            return EXIT_INVALID_INPUT;
        }
        throw error;
    }
}
