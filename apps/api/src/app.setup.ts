import {
  BadRequestException,
  HttpStatus,
  INestApplication,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';

function collectConstraintMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectConstraintMessages(error.children ?? []),
  ]);
}

/**
 * Global request handling shared by main.ts and the e2e tests, so both
 * run the same validation.
 *
 * Validation failures keep Nest's usual body and add the
 * `VALIDATION_FAILED` code every other error response carries.
 */
export function applyGlobalConfiguration(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      exceptionFactory: (errors) =>
        new BadRequestException({
          statusCode: HttpStatus.BAD_REQUEST,
          error: 'Bad Request',
          code: 'VALIDATION_FAILED',
          message: collectConstraintMessages(errors),
        }),
    }),
  );
}
