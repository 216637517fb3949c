export type SupportCaseStatus = 'open' | 'in_progress' | 'resolved' | 'closed';

export interface ClientRecord {
  /** Surrogate key used by joins. */
  id: number;
  /** Public identifier the caller reads out, e.g. a national id number. */
  clientId: string;
  name: string;
  email: string;
}

export interface ProductRecord {
  name: string;
  type: string;
}

export interface SupportCaseRecord {
  id: number;
  description: string;
  status: SupportCaseStatus;
  /** `YYYY-MM-DD HH:MM:SS`, UTC. */
  createdDate: string;
}

export interface ClientRepository {
  lookupClient(clientId: string): Promise<ClientRecord | null>;
  listClientProducts(client: ClientRecord): Promise<ProductRecord[]>;
  listOpenCases(client: ClientRecord): Promise<SupportCaseRecord[]>;
  /** Creates an `open` case and returns its id. */
  createSupportCase(client: ClientRecord, description: string): Promise<number>;
}
