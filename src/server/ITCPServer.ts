/**
 * Accepts protocol connections and hands each one to its own handler.
 */
export interface ITCPServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  isListening(): boolean;
  getPort(): number;
  getConnectionCount(): number;
}
