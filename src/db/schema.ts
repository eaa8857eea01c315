import { REQUEST_STATUSES } from '../types/request_types';

export const REQUESTS_TABLE = 'foia_requests';

const statusList = REQUEST_STATUSES.map(s => `'${s}'`).join(',\n              ');

export const SCHEMA_SQL = `
        CREATE TABLE IF NOT EXISTS public.${REQUESTS_TABLE} (
          id SERIAL PRIMARY KEY,
          reference_id VARCHAR(128) UNIQUE,
          agency VARCHAR(256) NOT NULL,
          agency_key VARCHAR(64),
          jurisdiction VARCHAR(64) NOT NULL,
          topic VARCHAR(512) NOT NULL,
          request_text TEXT NOT NULL DEFAULT '',
          created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
          filed_date DATE,
          deadline DATE,
          acknowledged_date DATE,
          extended_date DATE,
          extended_deadline DATE,
          response_date DATE,
          status TEXT NOT NULL DEFAULT 'DRAFT' CHECK (
            status IN (
              ${statusList}
            )
          ),
          docs_received INTEGER NOT NULL DEFAULT 0,
          pages_received INTEGER NOT NULL DEFAULT 0,
          pages_withheld INTEGER NOT NULL DEFAULT 0,
          exemptions_cited TEXT,
          response_summary TEXT,
          filing_method VARCHAR(64),
          confirmation_number VARCHAR(128),
          assigned_analyst VARCHAR(128),
          fee_paid VARCHAR(64),
          fee_waiver_requested BOOLEAN NOT NULL DEFAULT TRUE,
          fee_waiver_granted BOOLEAN,
          notes TEXT,
          appeal_filed BOOLEAN NOT NULL DEFAULT FALSE,
          appeal_date DATE,
          appeal_body TEXT,
          appeal_outcome TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_${REQUESTS_TABLE}_agency ON public.${REQUESTS_TABLE} (agency);
        CREATE INDEX IF NOT EXISTS idx_${REQUESTS_TABLE}_jurisdiction ON public.${REQUESTS_TABLE} (jurisdiction);
        CREATE INDEX IF NOT EXISTS idx_${REQUESTS_TABLE}_status ON public.${REQUESTS_TABLE} (status);
`;
