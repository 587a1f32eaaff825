import { ValidationPipe } from '@nestjs/common';

/**
 * Global pipe for DTO validation; multipart fields arrive as strings and
 * are converted to the DTO's declared types
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
  });
}
