export interface RCONConfig {
  host: string;
  port: number;
  password: string;
  commandTimeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface RCONResponse {
  success: boolean;
  data: string;
  error?: string;
}

export interface RCONPacket {
  id: number;
  type: number;
  payload: string;
}

export const PacketType = {
  Response: 0,
  Command: 2,
  AuthResponse: 2,
  Auth: 3,
} as const;
