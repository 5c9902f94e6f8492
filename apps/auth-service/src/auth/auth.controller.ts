/**
 * Auth Controller
 * Routes: /auth/*
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { Request } from 'express';
import { ERRORS } from '@tollgate/common/errors';
import { resolveClientAddress } from '../gate/client-address';
import { AuthService } from './auth.service';
import { LoginDto, LoginResponseDto } from './dto/login.dto';
import { MeResponseDto } from './dto/principal.dto';
import { RefreshDto, RefreshResponseDto } from './dto/refresh.dto';
import { AuthenticatedRequest, JwtAuthGuard } from './guards/jwt-auth.guard';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /auth/login
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto, @Req() req: Request): Promise<LoginResponseDto> {
    return this.authService.login(dto, resolveClientAddress(req));
  }

  /**
   * POST /auth/refresh
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshDto): Promise<RefreshResponseDto> {
    return this.authService.refresh(dto);
  }

  /**
   * POST /auth/logout
   * Succeeds whether or not the token was known
   */
  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  async logout(@Body() dto: RefreshDto): Promise<void> {
    await this.authService.logout(dto.refresh_token);
  }

  /**
   * GET /auth/me
   * Requires valid access token
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  async me(@Req() req: AuthenticatedRequest): Promise<MeResponseDto> {
    // req.user is set by JwtAuthGuard
    if (!req.user) {
      throw ERRORS.TokenInvalid();
    }
    return this.authService.me(req.user);
  }
}
