import { Module } from '@nestjs/common';
import { UpstreamModule } from '../upstream/upstream.module';
import { AuthService } from './auth.service';
import { CredentialService } from './credential.service';
import { AuthGuard } from './guards/auth.guard';

@Module({
    imports: [UpstreamModule],
    providers: [AuthService, CredentialService, AuthGuard],
    exports: [AuthService, CredentialService, AuthGuard],
})
export class AuthModule { }
