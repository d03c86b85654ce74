import { AppConfigNamespaced } from './app.config';
import { EmbeddingConfigNamespaced } from './embedding.config';
import { ProcessingConfigNamespaced } from './processing.config';
import { SearchConfigNamespaced } from './search.config';
import { SharepointConfigNamespaced } from './sharepoint.config';

export type Config = AppConfigNamespaced &
  SharepointConfigNamespaced &
  ProcessingConfigNamespaced &
  EmbeddingConfigNamespaced &
  SearchConfigNamespaced;
