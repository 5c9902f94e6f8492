/**
 * Tollgate JWT Module
 * Provides RS256 access token signing and verification
 */

import { Logger, Module } from '@nestjs/common';
import { JwtModule as NestJwtModule } from '@nestjs/jwt';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CLOCK, systemClock } from '@tollgate/common/types';
import { JwtService } from './jwt.service';
import { loadSigningKeys, SigningKeySource } from './signing-keys';

@Module({
  imports: [
    ConfigModule,
    NestJwtModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const source = config.get<SigningKeySource>('jwt') ?? {};
        const { privateKey, publicKeyPem } = loadSigningKeys(source);

        new Logger('JwtModule').log('RS256 signing key pair loaded');

        return {
          privateKey,
          publicKey: publicKeyPem,
          signOptions: {
            // NOTE: no expiresIn - exp is always set explicitly in claims
            algorithm: 'RS256',
          },
          verifyOptions: {
            algorithms: ['RS256'],
          },
        };
      },
    }),
  ],
  providers: [JwtService, { provide: CLOCK, useValue: systemClock }],
  exports: [JwtService],
})
export class JwtModule {}
