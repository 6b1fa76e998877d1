import { Global, Module } from '@nestjs/common';
import { PatientIdentityService } from './patient-identity.service';

@Global()
@Module({
  providers: [PatientIdentityService],
  exports: [PatientIdentityService],
})
export class IdentityModule {}
