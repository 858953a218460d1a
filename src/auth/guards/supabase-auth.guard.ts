import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import { SupabaseService } from '../../common/supabase.service';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { errorMessage, errorStack } from '../../common/utils/errors';

/**
 * Protects administration routes. The Bearer token must be a valid Supabase
 * session JWT; the resolved user is attached to `request.user`.
 */
@Injectable()
export class SupabaseAuthGuard implements CanActivate {
  private readonly logger = new Logger(SupabaseAuthGuard.name);

  constructor(private readonly supabaseService: SupabaseService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.logger.warn('No JWT token found in Authorization header');
      throw new UnauthorizedException('Authorization token is required');
    }

    try {
      const {
        data: { user },
        error,
      } = await this.supabaseService.getClient().auth.getUser(token);

      if (error) {
        this.logger.warn(`Token validation failed: ${error.message}`);
        if (error.message === 'invalid JWT' || error.message.includes('expired')) {
          throw new UnauthorizedException('Invalid or expired token');
        }
        throw new UnauthorizedException('Authentication failed');
      }
      if (!user) {
        throw new UnauthorizedException('Authentication failed');
      }

      request.user = user;
      this.logger.debug(`User ${user.id} authenticated.`);
      return true;
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        throw error;
      }
      this.logger.error(`Unexpected error during authentication: ${errorMessage(error)}`, errorStack(error));
      throw new UnauthorizedException('Authentication failed due to an internal error');
    }
  }

  private extractTokenFromHeader(request: AuthenticatedRequest): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    return type === 'Bearer' ? token : undefined;
  }
}
