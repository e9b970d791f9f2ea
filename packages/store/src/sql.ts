/**
 * @otpkeep/store - SQL statements
 *
 * One flat `token` table; rows are addressed by SQLite's implicit rowid.
 *
 * @packageDocumentation
 */

export const TOKEN_COLUMNS = [
  "rowid",
  "type",
  "algo",
  "counter",
  "digits",
  "issuer_int",
  "issuer_ext",
  "label",
  "period",
  "exp_date",
  "pin",
  "serial",
  "secret",
] as const;

export const SQL_CREATE_TOKENS_TABLE = `
create table if not exists token (
    type text,
    algo text,
    counter integer,
    digits integer,
    issuer_int text,
    issuer_ext text,
    label text,
    period integer,
    exp_date text,
    pin text,
    serial text,
    secret text
)`;

export const SQL_DROP_TOKENS_TABLE = "drop table if exists token";

export const SQL_SELECT_TOKENS = `select ${TOKEN_COLUMNS.join(", ")} from token`;

export const SQL_INSERT_TOKEN = `
insert into token (type, algo, counter, digits, issuer_int, issuer_ext, label, period, exp_date, pin, serial, secret)
values (@type, @algo, @counter, @digits, @issuer_int, @issuer_ext, @label, @period, @exp_date, @pin, @serial, @secret)`;

export const SQL_UPDATE_TOKEN = `
update token
set
    type = @type,
    algo = @algo,
    counter = @counter,
    digits = @digits,
    issuer_int = @issuer_int,
    issuer_ext = @issuer_ext,
    label = @label,
    period = @period,
    exp_date = @exp_date,
    pin = @pin,
    serial = @serial,
    secret = @secret
where rowid = @rowid`;

export const SQL_DELETE_TOKEN = "delete from token where rowid = ?";
