import { InternalServerErrorException } from '@nestjs/common';

export class OptimizationFailedException extends InternalServerErrorException {
  constructor() {
    super('Optimization failed');
  }
}
