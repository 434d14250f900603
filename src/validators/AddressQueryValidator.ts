import _ from 'lodash';
import { matchedData, query, ValidationChain, validationResult } from 'express-validator';
import { InsufficientParametersError } from '../errors/ServiceError';
import { IAddressValidator } from '../interfaces/services';
import { AddressQuery } from '../types/domain';

const OPTIONAL_FIELDS = ['unit', 'city', 'state', 'zip'] as const;

export const SUFFICIENCY_MESSAGE = "either 'zip' or both 'city' and 'state' must be specified";

const addressChains: ValidationChain[] = [
  query('street')
    .exists().withMessage("'street' must be specified").bail()
    .isString().withMessage("'street' must be a single value").bail()
    .trim()
    .notEmpty().withMessage("'street' must not be blank"),
  ...OPTIONAL_FIELDS.map((field) =>
    query(field)
      .optional({ values: 'falsy' })
      .isString().withMessage(`'${field}' must be a single value`).bail()
      .trim()
  )
];

// Blank after trimming counts as not supplied
function presentValue(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export class AddressQueryValidator implements IAddressValidator {
  async validate(params: Record<string, unknown>): Promise<AddressQuery> {
    // express-validator works on anything request-shaped; copy so sanitizers don't touch the caller's object
    const req = { query: { ...params } };
    for (const chain of addressChains) {
      await chain.run(req);
    }

    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      const messages = errors.array({ onlyFirstError: true }).map((error) => String(error.msg));
      throw new InsufficientParametersError(_.uniq(messages));
    }

    const data = matchedData(req, { locations: ['query'] });
    const street = presentValue(data.street);
    if (!street) {
      throw new InsufficientParametersError(["'street' must not be blank"]);
    }

    const unit = presentValue(data.unit);
    const city = presentValue(data.city);
    const state = presentValue(data.state);
    const zip = presentValue(data.zip);

    // The provider needs a ZIP or a city/state pair to geocode a street line
    if (!zip && !(city && state)) {
      throw new InsufficientParametersError([SUFFICIENCY_MESSAGE]);
    }

    const address: AddressQuery = {
      street,
      ...(unit ? { unit } : {}),
      ...(city ? { city } : {}),
      ...(state ? { state } : {}),
      ...(zip ? { zip } : {})
    };
    return Object.freeze(address);
  }
}
