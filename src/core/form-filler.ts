import type { FormElement, FormPage } from '../browser/page';
import type { ApplicationInput, FieldMapping, LogicalField } from '../types';
import { silentLogger, type Logger } from '../utils/logger';
import { ApplyError, describeError, ExternalServiceError, type OptionalFieldSkipped } from './errors';
import { valueFor } from './field-mapping';
import type { FormNavigator } from './navigator';
import { sleep, type Sleep } from './retry';

export const COMBOBOX_OPTION_SELECTOR = '.select__option, [role="option"]';

const COMBOBOX_MENU_DELAY_MS = 500;

export interface FillReport {
  filled: LogicalField[];
  skipped: OptionalFieldSkipped[];
}

export interface FieldFillerOptions {
  logger?: Logger;
  sleep?: Sleep;
}

export class FieldFiller {
  private logger: Logger;
  private wait: Sleep;

  constructor(
    private page: FormPage,
    private navigator: FormNavigator,
    private mappings: FieldMapping[],
    options: FieldFillerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Fills required fields, then optional ones, in mapping order. Required
   * failures abort; optional failures are recorded and skipped.
   */
  async fillAll(input: ApplicationInput): Promise<FillReport> {
    const report: FillReport = { filled: [], skipped: [] };
    const ordered = [...this.mappings.filter((m) => m.required), ...this.mappings.filter((m) => !m.required)];

    for (const mapping of ordered) {
      const value = valueFor(input, mapping.field);
      if (!value) continue;

      if (mapping.required) {
        await this.fillRequired(mapping, value);
        report.filled.push(mapping.field);
        continue;
      }

      const skipped = await this.fillOptional(mapping, value);
      if (skipped) {
        this.logger.debug(`Skipped optional field ${skipped.label}: ${skipped.reason}`);
        report.skipped.push(skipped);
      } else {
        report.filled.push(mapping.field);
      }
    }

    return report;
  }

  private async fillRequired(mapping: FieldMapping, value: string): Promise<void> {
    const lookup = await this.navigator.findField(mapping);
    if (!lookup.found) return;
    try {
      await this.apply(mapping, lookup.element, value);
      this.logger.debug(`Filled ${mapping.label}`);
    } catch (error) {
      if (error instanceof ApplyError) throw error;
      throw new ExternalServiceError('browser', `Failed to fill ${mapping.label}`, error);
    }
  }

  private async fillOptional(mapping: FieldMapping, value: string): Promise<OptionalFieldSkipped | null> {
    try {
      const lookup = await this.navigator.findField(mapping);
      if (!lookup.found) {
        return { field: mapping.field, label: mapping.label, reason: 'no candidate selector matched' };
      }
      await this.apply(mapping, lookup.element, value);
      this.logger.debug(`Filled ${mapping.label}`);
      return null;
    } catch (error) {
      return { field: mapping.field, label: mapping.label, reason: describeError(error) };
    }
  }

  private async apply(mapping: FieldMapping, element: FormElement, value: string): Promise<void> {
    switch (mapping.kind) {
      case 'text':
        await element.fill(value);
        return;
      case 'file':
        await element.setInputFiles(value);
        return;
      case 'select':
        await selectOption(element, value, this.logger);
        return;
      case 'combobox':
        await chooseComboboxOption(this.page, element, value, this.wait);
        return;
    }
  }
}

/** Selects by visible label, then by option value. */
export async function selectOption(element: FormElement, value: string, logger: Logger = silentLogger): Promise<void> {
  try {
    await element.selectOption({ label: value });
  } catch (labelError) {
    logger.debug(`No option labelled "${value}" (${describeError(labelError)}), trying by value`);
    await element.selectOption({ value });
  }
}

/** React Select: type to filter, then pick the first option containing the value. */
export async function chooseComboboxOption(
  page: FormPage,
  element: FormElement,
  value: string,
  wait: Sleep = sleep
): Promise<void> {
  await element.click();
  await element.fill('');
  await element.type(value);
  await wait(COMBOBOX_MENU_DELAY_MS);

  const needle = value.toLowerCase();
  for (const option of await page.queryAll(COMBOBOX_OPTION_SELECTOR)) {
    if (!(await option.isVisible())) continue;
    const text = await option.textContent();
    if (text.toLowerCase().includes(needle)) {
      await option.click();
      return;
    }
  }
  await element.press('Enter');
}
