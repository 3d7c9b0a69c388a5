import { fileURLToPath } from "node:url";
import { tabula } from "..";

// One SQLite file, one class, one observed list.
const sqlitePath = fileURLToPath(new URL("./garage.sqlite", import.meta.url));
const layer = tabula.layers.sqlite(sqlitePath);

const carSchema = tabula
  .schema({
    name: "Car",
    primaryKey: "plate",
    properties: [
      { name: "plate", type: "string" },
      { name: "make", type: "string" },
      { name: "mileage", type: "list", elementType: "int" },
    ],
  })
  .unwrap();

const session = tabula.session(layer, { schemas: [carSchema] }).unwrap();

const car = session.write(() =>
  tabula.create(session, "Car", { plate: "AB-123", make: "Citroen" }, true),
);

const mileage = car.list("mileage");
const token = mileage.addObserver({
  didChange: (property, kind, indexes) => {
    console.log(`${property}: ${kind} at ${indexes}`);
  },
});

session.write(() => {
  mileage.append(12000);
  mileage.extend([12500, 13100]);
});

console.log(mileage.toArray());
console.log(mileage.indexOf(12500));

token.cancel();
session.close();
