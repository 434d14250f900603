import { ServiceError } from '../errors/ServiceError';
import {
  IAddressValidator,
  IAuthGate,
  ILogger,
  IPropertyDetailsClient,
  IPropertyDetailsHandler,
  PropertyDetailsRequest
} from '../interfaces/services';
import { errorResponse, ServiceResponse, translateOutcome } from '../utils/ResponseTranslator';

// Gate -> validator -> provider call -> translation, stopping at the first failure.
// No business rules live here.
export class PropertyDetailsHandler implements IPropertyDetailsHandler {
  constructor(
    private readonly authGate: IAuthGate,
    private readonly validator: IAddressValidator,
    private readonly client: IPropertyDetailsClient,
    private readonly logger: ILogger
  ) {}

  async handle(request: PropertyDetailsRequest): Promise<ServiceResponse> {
    const { requestId, signal } = request;

    try {
      this.authGate.authorize(request.authorization);
      const address = await this.validator.validate(request.query);
      const outcome = await this.client.lookup(address, { requestId, signal });
      const response = translateOutcome(outcome);

      if (!response.ok) {
        this.logger.warn('Property details lookup failed', { requestId, kind: response.error.kind });
      }
      return response;
    } catch (error) {
      if (error instanceof ServiceError) {
        this.logger.warn('Property details request rejected', { requestId, kind: error.kind });
        return errorResponse(error);
      }
      throw error;
    }
  }
}
