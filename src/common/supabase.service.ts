import { Injectable, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { errorMessage, errorStack } from './utils/errors';

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private _supabase?: SupabaseClient;
  private _supabaseService?: SupabaseClient;
  private initializationPromise: Promise<void> | null = null;

  constructor(private readonly configService: ConfigService) {}

  async initialize(): Promise<void> {
    // The async provider calls this once; later callers share the same promise.
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = (async () => {
      this.logger.log('Initializing Supabase clients...');
      const supabaseUrl = this.configService.get<string>('SUPABASE_URL');
      const supabaseAnonKey = this.configService.get<string>('SUPABASE_ANON_KEY');
      const supabaseServiceKey = this.configService.get<string>('SUPABASE_SERVICE_ROLE_KEY');

      if (!supabaseUrl || !supabaseAnonKey) {
        this.logger.error('SUPABASE_URL or SUPABASE_ANON_KEY missing in config! Supabase client NOT initialized.');
        throw new InternalServerErrorException('Supabase config missing for client initialization.');
      }

      try {
        this._supabase = createClient(supabaseUrl, supabaseAnonKey);
        this.logger.log('Supabase client (anon key) initialized.');

        if (supabaseServiceKey) {
          this._supabaseService = createClient(supabaseUrl, supabaseServiceKey);
          this.logger.log('Supabase service client (service_role key) initialized.');
        } else {
          this.logger.warn('SUPABASE_SERVICE_ROLE_KEY missing; repository writes go through the anon client and are subject to RLS.');
        }
      } catch (error) {
        this.logger.error(`Failed to initialize Supabase clients: ${errorMessage(error)}`, errorStack(error));
        throw new InternalServerErrorException(`Failed to initialize Supabase clients: ${errorMessage(error)}`);
      }
    })();

    return this.initializationPromise;
  }

  getClient(): SupabaseClient {
    if (!this._supabase) {
      this.logger.error('Attempted to get Supabase client, but it is not initialized.');
      throw new InternalServerErrorException('Supabase client is not available. Initialization might have failed or is not complete.');
    }
    return this._supabase;
  }

  getServiceClient(): SupabaseClient {
    if (!this._supabaseService) {
      // Fall back to the anon client; row level security then applies.
      return this.getClient();
    }
    return this._supabaseService;
  }
}
