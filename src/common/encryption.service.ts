import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as CryptoJS from 'crypto-js';
import { errorMessage } from './utils/errors';

@Injectable()
export class EncryptionService implements OnModuleInit {
  private readonly logger = new Logger(EncryptionService.name);
  private secretKey?: string;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const secret = this.configService.get<string>('CREDENTIALS_ENCRYPTION_SECRET');
    if (!secret) {
      throw new Error('CREDENTIALS_ENCRYPTION_SECRET must be set in environment variables.');
    }
    if (secret.length < 32) {
      this.logger.warn('CREDENTIALS_ENCRYPTION_SECRET is shorter than 32 characters. Consider a longer, random key.');
    }
    this.secretKey = secret;
  }

  /**
   * Encrypts a JSON object.
   * @returns AES ciphertext, Base64 encoded for storage in a text column.
   */
  encrypt(data: Record<string, unknown>): string {
    const encrypted = CryptoJS.AES.encrypt(JSON.stringify(data), this.getSecretKey()).toString();
    return Buffer.from(encrypted).toString('base64');
  }

  /**
   * Decrypts a value produced by {@link encrypt}.
   */
  decrypt(encryptedDataBase64: string): Record<string, unknown> {
    const secretKey = this.getSecretKey();
    let jsonString: string;
    try {
      const encryptedData = Buffer.from(encryptedDataBase64, 'base64').toString('utf-8');
      jsonString = CryptoJS.AES.decrypt(encryptedData, secretKey).toString(CryptoJS.enc.Utf8);
    } catch (error) {
      throw new Error(`Failed to decrypt credentials: ${errorMessage(error)}`);
    }
    if (!jsonString) {
      throw new Error('Decryption failed: empty result after decryption.');
    }
    const parsed: unknown = JSON.parse(jsonString);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Decrypted credentials are not a JSON object.');
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private getSecretKey(): string {
    if (!this.secretKey) {
      throw new Error('Encryption secret key is not initialized.');
    }
    return this.secretKey;
  }
}
