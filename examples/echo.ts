/**
 * Echo server and client on one process.
 *
 *   TAGWIRE_FABRIC=tcp TAGWIRE_LOG_LEVEL=info npx tsx examples/echo.ts
 */
import {
  createEndpoint,
  createListener,
  reset,
  textDeserializer,
  withEndpoint,
  withListener,
  type Endpoint,
} from "../src/index";

const echo = async (ep: Endpoint) => {
  const message = await ep.recvObject();
  await ep.sendObject(message);
  await ep.close();
};

async function main() {
  const served: Promise<void>[] = [];
  await withListener(
    createListener(ep => served.push(echo(ep)), { host: "127.0.0.1" }),
    listener =>
      withEndpoint(createEndpoint("127.0.0.1", listener.port), async ep => {
        await ep.sendObject("hello over tagwire");
        const reply = await ep.recvObject();
        console.log(`reply: ${textDeserializer(reply)}`);
      }),
  );
  await Promise.all(served);
  await reset();
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
