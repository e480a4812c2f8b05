import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { AuthService } from '../../application/auth.service';
import {
  EmailTakenError,
  InvalidCredentialsError,
  RegistrationClosedError,
  UserNotFoundError,
  UsernameTakenError,
} from '../../application/errors';
import { SessionCache } from '../../application/session-cache';
import { SessionToken } from '../../auth-user.decorator';
import { LoginDto, RegisterDto } from '../dto/auth.dto';
import { SessionTokenGuard } from '../guards/session-token.guard';

const toHttpError = (error: unknown): unknown => {
  if (error instanceof UsernameTakenError || error instanceof EmailTakenError) {
    return new ConflictException(error.message);
  }
  if (error instanceof InvalidCredentialsError) {
    return new UnauthorizedException(error.message);
  }
  if (error instanceof RegistrationClosedError) {
    return new ForbiddenException(error.message);
  }
  if (error instanceof UserNotFoundError) {
    return new NotFoundException(error.message);
  }
  return error;
};

@Controller()
export class AuthController {
  constructor(
    @Inject(AuthService) private readonly auth: AuthService,
    @Inject(SessionCache) private readonly sessionCache: SessionCache
  ) {}

  @Post('register')
  async register(@Body() dto: RegisterDto): Promise<{ session: string }> {
    try {
      return await this.auth.register(dto);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<{ session: string }> {
    try {
      return await this.auth.login(dto);
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionTokenGuard)
  async logout(
    @SessionToken() sessionToken: string | undefined
  ): Promise<{ revoked: boolean }> {
    if (!sessionToken) {
      throw new BadRequestException('Session token missing from request');
    }
    this.sessionCache.invalidate(sessionToken);
    const revoked = await this.auth.logout(sessionToken);
    return { revoked };
  }

  @Get('user/:username')
  async getUser(
    @Param('username') username: string
  ): Promise<{ username: string }> {
    try {
      return await this.auth.getUser(username);
    } catch (error) {
      throw toHttpError(error);
    }
  }
}
