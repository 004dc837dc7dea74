export interface Product {
  id: string;
  name: string;
  origin: string;
  description: string;
  category: string;
  tags: string[];
  certifications: string[];   // sha256 hex of certificate documents
  mediaHashes: string[];      // sha256 hex of photos / scans
  custom: Record<string, string>;
  owner: string;
  createdAt: string;          // ISO date, ledger time
  active: boolean;
  authorizedActors: string[]; // ordered set, owner first at registration
}

export interface RegisterProductInput {
  id: string;
  name: string;
  origin: string;
  owner: string;
  description?: string;
  category?: string;
  tags?: string[];
  certifications?: string[];
  mediaHashes?: string[];
  custom?: Record<string, string>;
}
