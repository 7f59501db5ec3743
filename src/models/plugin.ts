/**
 * Validator plugins
 * Lets host applications add validation rules (for example a market profile) on top of the
 * schema validation every model already gets.
 *
 * @example
 * class EventNameRequired extends Validator<'event'> {
 *   validate(event: Event): void {
 *     if (!event.eventName) throw new Error('eventName is required');
 *   }
 * }
 *
 * class ProfilePlugin extends ValidatorPlugin {}
 *
 * ValidatorPluginRegistry.registerPlugin(
 *   new ProfilePlugin('profile').registerValidator(new EventNameRequired('event', 'name_required'))
 * );
 */

import type { Event } from './event.js';
import type { Program } from './program.js';
import type { Report } from './report.js';
import type { Ven, Resource } from './ven.js';
import type { Subscription } from './subscription.js';
import { ModelValidationError, type ValidationIssue } from '../lib/errors.js';

export interface ModelTypeMap {
  event: Event;
  program: Program;
  report: Report;
  ven: Ven;
  resource: Resource;
  subscription: Subscription;
}

export type ModelKind = keyof ModelTypeMap;

export abstract class Validator<K extends ModelKind> {
  readonly model: K;
  readonly validatorName: string;
  private plugin: ValidatorPlugin | null = null;

  constructor(model: K, validatorName: string) {
    this.model = model;
    this.validatorName = validatorName;
  }

  /**
   * Throws when the value is invalid
   */
  abstract validate(value: ModelTypeMap[K]): void;

  registerWithPlugin(plugin: ValidatorPlugin): void {
    this.plugin = plugin;
  }

  getValidatorId(): string {
    return `${this.plugin?.name ?? 'unregistered'}.${this.model}.${this.validatorName}`;
  }
}

type ValidatorsByModel = { [K in ModelKind]?: Validator<K>[] };

export abstract class ValidatorPlugin {
  readonly name: string;
  private validators: ValidatorsByModel = {};

  constructor(name: string) {
    this.name = name;
  }

  registerValidator<K extends ModelKind>(validator: Validator<K>): this {
    const existing: Validator<K>[] = this.validators[validator.model] ?? [];
    validator.registerWithPlugin(this);
    this.validators[validator.model] = [...existing, validator];
    return this;
  }

  getModelValidators<K extends ModelKind>(model: K): Validator<K>[] {
    return this.validators[model] ?? [];
  }
}

/**
 * Process-wide plugin registry
 */
export class ValidatorPluginRegistry {
  private static plugins: ValidatorPlugin[] = [];

  static registerPlugin(plugin: ValidatorPlugin): typeof ValidatorPluginRegistry {
    ValidatorPluginRegistry.plugins.push(plugin);
    return ValidatorPluginRegistry;
  }

  static clearPlugins(): void {
    ValidatorPluginRegistry.plugins = [];
  }

  static getPlugins(): readonly ValidatorPlugin[] {
    return ValidatorPluginRegistry.plugins;
  }

  static getModelValidators<K extends ModelKind>(model: K): Validator<K>[] {
    return ValidatorPluginRegistry.plugins.flatMap((plugin) => plugin.getModelValidators(model));
  }
}

/**
 * Runs every registered validator for the model and reports all failures at once
 */
export function runPluginValidators<K extends ModelKind>(model: K, label: string, value: ModelTypeMap[K]): void {
  const issues: ValidationIssue[] = [];

  for (const validator of ValidatorPluginRegistry.getModelValidators(model)) {
    try {
      validator.validate(value);
    } catch (error) {
      issues.push({
        path: '',
        message: `${validator.getValidatorId()}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }

  if (issues.length > 0) {
    throw new ModelValidationError(label, issues);
  }
}
