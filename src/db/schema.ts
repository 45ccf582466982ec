/**
 * DDL for the `tec_data` table, per dialect. Keep in sync with sql/init.sql.
 */

export const TABLE_NAME = "tec_data";

const COLUMNS_SQL = `
    loc VARCHAR(255),
    loc_zn VARCHAR(255),
    loc_name VARCHAR(255),
    loc_purp_desc VARCHAR(255),
    loc_qti VARCHAR(255),
    flow_ind VARCHAR(10),
    dc INTEGER,
    opc INTEGER,
    tsq INTEGER,
    oac INTEGER,
    it BOOLEAN,
    auth_overrun_ind BOOLEAN,
    nom_cap_exceed_ind BOOLEAN,
    all_qty_avail BOOLEAN,
    qty_reason VARCHAR(255),
    cycle INTEGER`;

export const POSTGRES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id SERIAL PRIMARY KEY,${COLUMNS_SQL}
);
`;

export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,${COLUMNS_SQL}
);
`;
