import assert from "node:assert/strict";
import test from "node:test";
import { quietLogger } from "./logger";
import { buildFilterSql, payloadPath, PgVectorStore, SqlClient, SqlResult } from "./vectorStore";

interface RecordedQuery {
  text: string;
  params: unknown[];
}

function recordingClient(respond: (text: string) => SqlResult | Error = () => ({ rows: [], rowCount: 0 })) {
  const queries: RecordedQuery[] = [];
  const client: SqlClient = {
    async query(text, params) {
      queries.push({ text: text.replace(/\s+/g, " ").trim(), params: params ?? [] });
      const response = respond(text);
      if (response instanceof Error) {
        throw response;
      }
      return response;
    }
  };
  return { client, queries };
}

function store(client: SqlClient, dimension = 3) {
  return new PgVectorStore(client, {
    collection: "phone_products",
    dimension,
    retry: { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    logger: quietLogger(),
    sleep: async () => undefined
  });
}

test("payloadPath validates keys and builds a text path", () => {
  assert.equal(payloadPath("product_data.min_price"), "'{product_data,min_price}'");
  assert.throws(() => payloadPath("product_data'; drop table x"), /Invalid payload key/);
});

test("buildFilterSql ANDs range, set and equality conditions", () => {
  const params: unknown[] = ["[0,0,1]"];
  const sql = buildFilterSql(
    {
      must: [
        { key: "product_data.min_price", range: { gte: 1000, lte: 8000000 } },
        { key: "product_data.brand", matchAny: ["Samsung"] },
        { key: "product_data.id", matchValue: "p-1" }
      ]
    },
    params
  );
  assert.equal(
    sql,
    "(payload #>> '{product_data,min_price}')::double precision >= $2 and " +
      "(payload #>> '{product_data,min_price}')::double precision <= $3 and " +
      "payload #>> '{product_data,brand}' = any($4::text[]) and " +
      "payload #>> '{product_data,id}' = $5"
  );
  assert.deepEqual(params, ["[0,0,1]", 1000, 8000000, ["Samsung"], "p-1"]);
  assert.equal(buildFilterSql(undefined, []), "true");
});

test("search applies the score floor and limit", async () => {
  const { client, queries } = recordingClient(() => ({
    rows: [{ id: "a", score: "0.91", payload: { text: "Galaxy A15" } }],
    rowCount: 1
  }));
  const points = await store(client).search([0.1, 0.2, 0.3], {
    limit: 25,
    scoreThreshold: 0.6,
    filter: { must: [{ key: "product_data.brand", matchAny: ["Samsung"] }] }
  });

  assert.deepEqual(points, [{ id: "a", score: 0.91, payload: { text: "Galaxy A15" } }]);
  assert.equal(queries.length, 1);
  assert.deepEqual(queries[0]?.params, ["[0.1,0.2,0.3]", ["Samsung"], 0.6, 25]);
  assert.match(queries[0]?.text ?? "", /1 - \(embedding <=> \$1::vector\) >= \$3/);
  assert.match(queries[0]?.text ?? "", /limit \$4$/);
});

test("search with a zero vector matches nothing and sends no query", async () => {
  const { client, queries } = recordingClient();
  const points = await store(client).search([0, 0, 0], { limit: 25, scoreThreshold: 0.6 });
  assert.deepEqual(points, []);
  assert.equal(queries.length, 0);
});

test("findByFilter reads the newest matching points", async () => {
  const { client, queries } = recordingClient();
  await store(client).findByFilter({ must: [{ key: "product_data.id", matchValue: "p-1" }] }, 1);
  assert.equal(
    queries[0]?.text,
    "select id, payload, 0 as score from phone_products where payload #>> '{product_data,id}' = $1 order by created_at desc limit $2"
  );
  assert.deepEqual(queries[0]?.params, ["p-1", 1]);
});

test("scrollByFilter pages in a stable order", async () => {
  const { client, queries } = recordingClient();
  await store(client).scrollByFilter({ must: [{ key: "product_data.id", matchValue: "p-1" }] }, 100, 200);
  assert.equal(
    queries[0]?.text,
    "select id, payload, 0 as score from phone_products where payload #>> '{product_data,id}' = $1 order by created_at, id limit $2 offset $3"
  );
  assert.deepEqual(queries[0]?.params, ["p-1", 100, 200]);
});

test("upsert allocates fresh ids and rejects wrong dimensions", async () => {
  const { client, queries } = recordingClient();
  const vectorStore = store(client);
  const first = await vectorStore.upsert([{ vector: [1, 0, 0], payload: { chunk_id: 0 } }]);
  const second = await vectorStore.upsert([{ vector: [1, 0, 0], payload: { chunk_id: 0 } }]);

  assert.equal(first.length, 1);
  assert.notEqual(first[0], second[0]);
  assert.deepEqual(queries[0]?.params.slice(1), ["[1,0,0]", '{"chunk_id":0}']);
  await assert.rejects(vectorStore.upsert([{ vector: [1, 0], payload: {} }]), /dimension 2/);
});

test("operations retry transient failures before giving up", async () => {
  let calls = 0;
  const { client } = recordingClient(() => {
    calls += 1;
    return calls < 3 ? new Error("connection refused") : { rows: [{ count: 7 }], rowCount: 1 };
  });
  assert.equal(await store(client).count(), 7);
  assert.equal(calls, 3);

  const failing = recordingClient(() => new Error("down"));
  await assert.rejects(store(failing.client).count(), /down/);
  assert.equal(failing.queries.length, 3);
});

test("ensureCollection creates the extension, table and id index", async () => {
  const { client, queries } = recordingClient();
  await store(client, 768).ensureCollection();
  assert.equal(queries.length, 3);
  assert.equal(queries[0]?.text, "create extension if not exists vector");
  assert.match(queries[1]?.text ?? "", /embedding vector\(768\)/);
  assert.match(queries[2]?.text ?? "", /phone_products_product_id_idx/);
});
