import { Global, Module } from '@nestjs/common';
import {
  CLINICAL_VOCABULARY,
  loadClinicalVocabulary,
} from './clinical-vocabulary';

@Global()
@Module({
  providers: [
    {
      provide: CLINICAL_VOCABULARY,
      useFactory: loadClinicalVocabulary,
    },
  ],
  exports: [CLINICAL_VOCABULARY],
})
export class VocabularyModule {}
