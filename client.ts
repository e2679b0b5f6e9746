export { 
    ldapClient 
} from "./src/ldap/client.js";
