import type { ObjectSchema } from 'joi';
import { ValidationError } from './Errors.js';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * Defaults declared in the schema are applied; every violation is reported at once.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Stored, validated configuration object */
    private readonly _config: T;

    /**
     * Creates a Configurator.
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws ValidationError listing every violation
     * @example
     * const schema = Joi.object({ port: Joi.number().required() });
     * const configurator = new Configurator(schema, { port: 3000 });
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this.__validate(rawConfig);
    }

    /**
     * Retrieves the stored configuration.
     * @returns T - Validated configuration object
     */
    public getConfig(): T {
        return this._config;
    }

    private __validate(rawConfig: unknown): T {
        const result = this._schema.validate(rawConfig, { abortEarly: false });

        if (result.error) {
            const details = result.error.details;
            throw new ValidationError(`Config validation error: ${details.map(detail => detail.message).join(`; `)}`, {
                paths: details.map(detail => detail.path.join(`.`)),
            });
        }
        if (result.value === undefined) {
            throw new ValidationError(`Config validation error: empty configuration`);
        }
        return result.value;
    }
}
