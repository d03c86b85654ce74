import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { sanitizeError } from '@sp-indexer/utils';
import { bootstrap } from './bootstrap';

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error({ msg: 'Indexer failed', error: sanitizeError(error) });
  process.exit(1);
});
