/**
 * Connection Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { connect } from '../index';
import { createLogger } from '../../utils/logger';

const logger = createLogger('test', { level: 'silent' });

describe('connect', () => {
    let dataDir: string;

    beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keeldb-test-'));
    });

    afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    it('creates the database and selects it', () => {
        const connection = connect(`keeldb://localhost/crm?data_dir=${encodeURIComponent(dataDir)}`, { logger });

        expect(connection.session.getDatabase()).toBe('crm');
        expect(connection.catalog.listDatabases()).toEqual(['crm']);
        expect(fs.existsSync(path.join(dataDir, 'databases', 'crm.json'))).toBe(true);
    });

    it('reopens an existing database', () => {
        const url = `keeldb://localhost/crm?data_dir=${encodeURIComponent(dataDir)}`;
        const first = connect(url, { logger });
        first.executeScript("CREATE TABLE contacts (id INT PRIMARY KEY, name STRING); INSERT INTO contacts VALUES (1, 'Ann');");

        const second = connect(url, { logger });
        expect(second.execute('SELECT name FROM contacts')).toMatchObject({ rows: [{ name: 'Ann' }] });
    });
});
