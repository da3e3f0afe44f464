/**
 * Builds the full application over in-memory SQLite and the fakes
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Application } from 'express';
import { createApp } from '../../src/app';
import { openConversationDatabase } from '../../src/config/database';
import { createServices } from '../../src/services/container';
import type { AppServices, ServiceOverrides } from '../../src/services/container';
import { ChartService } from '../../src/services/chart.service';
import { UploadService } from '../../src/services/upload.service';
import { FakeWarehouse, ScriptedLanguageModel } from './fakes';

export interface TestApp {
  app: Application;
  services: AppServices;
  llm: ScriptedLanguageModel;
  warehouse: FakeWarehouse;
  workDir: string;
  close(): void;
}

export function buildTestApp(overrides: Omit<ServiceOverrides, 'database' | 'llm' | 'warehouse'> = {}): TestApp {
  const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'insight-chat-'));
  const llm = new ScriptedLanguageModel(() => '```sql\nSELECT COUNT(*) AS total FROM employee\n```');
  const warehouse = new FakeWarehouse();

  const services = createServices({
    database: openConversationDatabase(':memory:'),
    llm,
    warehouse,
    uploads: new UploadService(path.join(workDir, 'uploads')),
    charts: new ChartService(path.join(workDir, 'charts')),
    ...overrides
  });

  return {
    app: createApp(services),
    services,
    llm,
    warehouse,
    workDir,
    close: () => {
      services.database.close();
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  };
}

export const route = (primary: string, secondary: string[] = []) =>
  JSON.stringify({ primary_agent: primary, secondary_agents: secondary, reasoning: 'test', sub_tasks: {} });

export const ROUTING = /routing agent/;
