/**
 * Centralized W3C vocabulary constants used by the mapping engine,
 * the schema importer and the HTTP export surface.
 */

// ============================================================================
// RDF (Resource Description Framework)
// https://www.w3.org/1999/02/22-rdf-syntax-ns
// ============================================================================

export const RDF = {
  namespace: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  type: "http://www.w3.org/1999/02/22-rdf-syntax-ns#type",
  first: "http://www.w3.org/1999/02/22-rdf-syntax-ns#first",
  rest: "http://www.w3.org/1999/02/22-rdf-syntax-ns#rest",
  nil: "http://www.w3.org/1999/02/22-rdf-syntax-ns#nil",
} as const;

// ============================================================================
// RDFS (RDF Schema)
// https://www.w3.org/2000/01/rdf-schema
// ============================================================================

export const RDFS = {
  namespace: "http://www.w3.org/2000/01/rdf-schema#",
  label: "http://www.w3.org/2000/01/rdf-schema#label",
  subClassOf: "http://www.w3.org/2000/01/rdf-schema#subClassOf",
  domain: "http://www.w3.org/2000/01/rdf-schema#domain",
  range: "http://www.w3.org/2000/01/rdf-schema#range",
  Literal: "http://www.w3.org/2000/01/rdf-schema#Literal",
} as const;

// ============================================================================
// OWL (Web Ontology Language)
// https://www.w3.org/2002/07/owl
// ============================================================================

export const OWL = {
  namespace: "http://www.w3.org/2002/07/owl#",
  Class: "http://www.w3.org/2002/07/owl#Class",
  ObjectProperty: "http://www.w3.org/2002/07/owl#ObjectProperty",
  DatatypeProperty: "http://www.w3.org/2002/07/owl#DatatypeProperty",
  equivalentProperty: "http://www.w3.org/2002/07/owl#equivalentProperty",
  unionOf: "http://www.w3.org/2002/07/owl#unionOf",
} as const;

// ============================================================================
// XSD (XML Schema Datatypes)
// https://www.w3.org/2001/XMLSchema
// ============================================================================

export const XSD = {
  namespace: "http://www.w3.org/2001/XMLSchema#",
  int: "http://www.w3.org/2001/XMLSchema#int",
  dateTime: "http://www.w3.org/2001/XMLSchema#dateTime",
  gYear: "http://www.w3.org/2001/XMLSchema#gYear",
} as const;

// ============================================================================
// SKOS and PROV
// ============================================================================

export const SKOS = {
  namespace: "http://www.w3.org/2004/02/skos/core#",
  altLabel: "http://www.w3.org/2004/02/skos/core#altLabel",
} as const;

export const PROV = {
  namespace: "http://www.w3.org/ns/prov#",
  generatedAtTime: "http://www.w3.org/ns/prov#generatedAtTime",
} as const;

// ============================================================================
// Convenience exports for commonly used URIs
// ============================================================================

export const RDF_TYPE = RDF.type;
export const RDFS_LABEL = RDFS.label;
export const SKOS_ALT_LABEL = SKOS.altLabel;
